import type { UserId } from '../../domain/inventory/shoe.js';

export type ShoeAction = 'AddShoe' | 'ViewAll' | 'ViewOne' | 'EditOne' | 'DeleteOne';

export type MenuState = 'LoggedOut' | 'MainMenu' | ShoeAction | 'Exited';

export type MenuEvent =
  | { type: 'login'; userId: UserId | null }
  | { type: 'choice'; input: string | null }
  | { type: 'completed' };

export interface Transition {
  state: MenuState;
  error?: string;
}

export const MAIN_MENU_LINES = [
  'Welcome to the Shoe Menu',
  '1. Add a shoe',
  '2. View all shoes',
  '3. View a specific shoe',
  '4. Edit a shoe',
  '5. Delete a shoe',
  '6. Exit',
];

const MAIN_MENU_CHOICES: Record<string, ShoeAction | 'Exited'> = {
  '1': 'AddShoe',
  '2': 'ViewAll',
  '3': 'ViewOne',
  '4': 'EditOne',
  '5': 'DeleteOne',
  '6': 'Exited',
};

export const INVALID_CHOICE = 'Error: Invalid choice, please try again';

export function isShoeAction(state: MenuState): state is ShoeAction {
  return (
    state === 'AddShoe' ||
    state === 'ViewAll' ||
    state === 'ViewOne' ||
    state === 'EditOne' ||
    state === 'DeleteOne'
  );
}

/**
 * LoggedOut → MainMenu → action → MainMenu … → Exited.
 * Events that make no sense in the current state leave it unchanged.
 */
export function nextState(state: MenuState, event: MenuEvent): Transition {
  switch (state) {
    case 'LoggedOut':
      if (event.type === 'login') {
        return { state: event.userId === null ? 'Exited' : 'MainMenu' };
      }
      return { state };

    case 'MainMenu': {
      if (event.type !== 'choice') {
        return { state };
      }
      if (event.input === null) {
        return { state: 'Exited' };
      }
      const target = Object.hasOwn(MAIN_MENU_CHOICES, event.input.trim())
        ? MAIN_MENU_CHOICES[event.input.trim()]
        : undefined;
      return target ? { state: target } : { state: 'MainMenu', error: INVALID_CHOICE };
    }

    case 'Exited':
      return { state };

    default:
      return event.type === 'completed' ? { state: 'MainMenu' } : { state };
  }
}
