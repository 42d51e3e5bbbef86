import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import type { UserStore } from '../../application/auth/userStore.js';
import { InventoryQueries } from '../../application/inventory/lister.js';
import { ShoeMutator } from '../../application/inventory/mutator.js';
import { ShoeSelector } from '../../application/inventory/selector.js';
import type { ShoeStore } from '../../application/inventory/shoeStore.js';
import { InteractiveSelector } from './interactiveSelector.js';
import { LoginMenu } from './loginMenu.js';
import { nextState } from './menuState.js';
import { ShoeMenu } from './shoeMenu.js';
import type { Terminal } from './terminal.js';

export interface SessionStores {
  users: UserStore;
  shoes: ShoeStore;
}

/**
 * One console session: log in, then run the inventory menu for that owner.
 */
export async function runSession(stores: SessionStores, terminal: Terminal): Promise<void> {
  const loginMenu = new LoginMenu(
    terminal,
    new RegisterUseCase(stores.users),
    new LoginUseCase(stores.users)
  );

  const userId = await loginMenu.run();
  const { state } = nextState('LoggedOut', { type: 'login', userId });
  if (state !== 'MainMenu' || userId === null) {
    return;
  }

  const shoeMenu = new ShoeMenu(
    {
      terminal,
      selector: new InteractiveSelector(new ShoeSelector(stores.shoes), terminal),
      mutator: new ShoeMutator(stores.shoes),
      queries: new InventoryQueries(stores.shoes),
    },
    userId
  );
  await shoeMenu.run();
}
