import type { InventoryQueries } from '../../application/inventory/lister.js';
import type { ShoeMutator } from '../../application/inventory/mutator.js';
import {
  toResolvedShoe,
  type Shoe,
  type ShoeAttributes,
  type ShoeField,
  type UserId,
} from '../../domain/inventory/shoe.js';
import { describeError, type FailedAction } from './errorReporter.js';
import type { InteractiveSelector } from './interactiveSelector.js';
import {
  INVALID_CHOICE,
  MAIN_MENU_LINES,
  isShoeAction,
  nextState,
  type MenuState,
  type ShoeAction,
} from './menuState.js';
import { FIELD_PROMPTS, promptShoeField } from './prompt.js';
import { formatShoeDetails, formatSummary } from './render.js';
import type { Terminal } from './terminal.js';

export interface ShoeMenuDeps {
  terminal: Terminal;
  selector: InteractiveSelector;
  mutator: ShoeMutator;
  queries: InventoryQueries;
}

const FAILED_ACTIONS: Record<ShoeAction, FailedAction> = {
  AddShoe: { subject: 'shoe', verb: 'add', pastTense: 'added' },
  ViewAll: { subject: 'shoe', verb: 'retrieve', pastTense: 'retrieved' },
  ViewOne: { subject: 'shoe', verb: 'retrieve', pastTense: 'retrieved' },
  EditOne: { subject: 'shoe', verb: 'update', pastTense: 'updated' },
  DeleteOne: { subject: 'shoe', verb: 'delete', pastTense: 'deleted' },
};

const EDIT_CHOICES: Record<string, ShoeField> = {
  '1': 'brand',
  '2': 'model',
  '3': 'colorway',
  '4': 'size',
  '5': 'price',
  '6': 'image',
  '7': 'condition',
};

const EDIT_DONE = '8';

export const EDIT_MENU_LINES = [
  'What would you like to edit?',
  ...Object.entries(EDIT_CHOICES).map(([choice, field]) => `${choice}. ${FIELD_PROMPTS[field].label}`),
  `${EDIT_DONE}. Done`,
];

type EditOutcome = { kind: 'updated'; shoe: Shoe } | { kind: 'unchanged' } | { kind: 'stop' };

function withField<F extends ShoeField>(shoe: Shoe, field: F, value: ShoeAttributes[F]): Shoe {
  const attributes: ShoeAttributes = { ...shoe };
  attributes[field] = value;
  return { ...shoe, ...attributes };
}

/**
 * Main inventory menu for one logged-in owner. Every action returns to the
 * menu; an error in one action is printed and never ends the loop.
 */
export class ShoeMenu {
  constructor(
    private deps: ShoeMenuDeps,
    private ownerId: UserId
  ) {}

  async run(): Promise<void> {
    const { terminal } = this.deps;
    let state: MenuState = 'MainMenu';

    while (state !== 'Exited') {
      if (state === 'MainMenu') {
        MAIN_MENU_LINES.forEach((line) => terminal.print(line));
        const input = await terminal.ask('Enter your choice: ');
        const transition = nextState(state, { type: 'choice', input });
        if (transition.error) {
          terminal.print();
          terminal.print(transition.error);
          terminal.print();
        }
        state = transition.state;
      } else if (isShoeAction(state)) {
        await this.perform(state);
        state = nextState(state, { type: 'completed' }).state;
      } else {
        state = 'Exited';
      }
    }

    terminal.print('Exiting Shoe Menu...');
  }

  async perform(action: ShoeAction): Promise<void> {
    try {
      switch (action) {
        case 'AddShoe':
          return await this.addShoe();
        case 'ViewAll':
          return await this.viewAll();
        case 'ViewOne':
          await this.deps.selector.resolve(this.ownerId);
          return;
        case 'EditOne':
          return await this.editShoe();
        case 'DeleteOne':
          return await this.deleteShoe();
      }
    } catch (error) {
      describeError(error, FAILED_ACTIONS[action]).forEach((line) => this.deps.terminal.error(line));
    }
  }

  private async addShoe(): Promise<void> {
    const { terminal, mutator } = this.deps;
    terminal.print('Adding a new shoe to your collection');

    const brand = await promptShoeField(terminal, 'brand', 'add');
    if (brand === null) return;
    const model = await promptShoeField(terminal, 'model', 'add');
    if (model === null) return;
    const colorway = await promptShoeField(terminal, 'colorway', 'add');
    if (colorway === null) return;
    const size = await promptShoeField(terminal, 'size', 'add');
    if (size === null) return;
    const price = await promptShoeField(terminal, 'price', 'add');
    if (price === null) return;
    const image = await promptShoeField(terminal, 'image', 'add');
    if (image === null) return;
    const condition = await promptShoeField(terminal, 'condition', 'add');
    if (condition === null) return;

    await mutator.add(this.ownerId, {
      brand,
      model,
      colorway,
      size,
      price,
      image,
      condition,
    });
    terminal.print('Shoe added to your collection!');
  }

  private async viewAll(): Promise<void> {
    const { terminal, queries } = this.deps;
    terminal.print('Grabbing all of your shoes from the database...');
    const rows = await queries.listGrouped(this.ownerId);
    terminal.print();
    formatSummary(rows).forEach((line) => terminal.print(line));
    terminal.print();
  }

  private async editShoe(): Promise<void> {
    const { terminal, selector, mutator } = this.deps;
    const resolution = await selector.resolve(this.ownerId);
    if (resolution.kind !== 'resolved') {
      return;
    }

    let shoe = resolution.record;
    terminal.print('Editing the shoe...');

    for (;;) {
      EDIT_MENU_LINES.forEach((line) => terminal.print(line));
      const input = await terminal.ask('Enter your choice: ');
      if (input === null || input.trim() === EDIT_DONE) {
        return;
      }

      const choice = input.trim();
      const field = Object.hasOwn(EDIT_CHOICES, choice) ? EDIT_CHOICES[choice] : undefined;
      if (!field) {
        terminal.print();
        terminal.print(INVALID_CHOICE);
        terminal.print();
        terminal.print(formatShoeDetails(toResolvedShoe(shoe)));
        terminal.print();
        continue;
      }

      const outcome = await this.editField(shoe, field);
      if (outcome.kind === 'stop') {
        return;
      }
      if (outcome.kind === 'updated') {
        shoe = outcome.shoe;
      }
    }
  }

  /**
   * One single-field write. A storage failure is reported and leaves the
   * edit menu open on the unchanged shoe.
   */
  private async editField<F extends ShoeField>(shoe: Shoe, field: F): Promise<EditOutcome> {
    const { terminal, mutator } = this.deps;
    const value = await promptShoeField(terminal, field, 'edit');
    if (value === null) {
      return { kind: 'stop' };
    }

    try {
      const { applied } = await mutator.updateField(shoe.id, field, value);
      if (!applied) {
        terminal.print('That shoe no longer exists; nothing was updated');
        return { kind: 'stop' };
      }
      terminal.print(`${FIELD_PROMPTS[field].label} updated successfully to be '${value}'`);
      return { kind: 'updated', shoe: withField(shoe, field, value) };
    } catch (error) {
      describeError(error, FAILED_ACTIONS.EditOne).forEach((line) => terminal.error(line));
      return { kind: 'unchanged' };
    }
  }

  private async deleteShoe(): Promise<void> {
    const { terminal, selector, mutator } = this.deps;
    const resolution = await selector.resolve(this.ownerId);
    if (resolution.kind !== 'resolved') {
      return;
    }

    const { shoe } = resolution;
    terminal.print('Deleting the shoe...');
    const { applied } = await mutator.delete(shoe.id);
    terminal.print(
      applied
        ? `${shoe.brand} ${shoe.model} was deleted successfully`
        : 'That shoe no longer exists; nothing was deleted'
    );
  }
}
