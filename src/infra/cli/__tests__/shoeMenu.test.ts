import { describe, it, expect, beforeEach } from 'vitest';
import { ShoeMenu } from '../shoeMenu.js';
import { InteractiveSelector } from '../interactiveSelector.js';
import { INVALID_CHOICE } from '../menuState.js';
import { ShoeSelector } from '../../../application/inventory/selector.js';
import { ShoeMutator } from '../../../application/inventory/mutator.js';
import { InventoryQueries } from '../../../application/inventory/lister.js';
import { StorageConnectivityError, StorageError } from '../../../application/errors.js';
import { InMemoryShoeStore } from '../../../test-utils/inMemoryShoeStore.js';
import { ScriptedTerminal } from '../../../test-utils/scriptedTerminal.js';
import type { ShoeAttributes } from '../../../domain/inventory/shoe.js';

const OWNER = 1;
const OTHER_OWNER = 2;

const bacon: ShoeAttributes = {
  brand: 'Nike',
  model: 'AirMax90',
  colorway: 'Bacon',
  size: 9.5,
  price: 120,
  image: 'bacon.jpg',
  condition: 'New',
};

describe('ShoeMenu', () => {
  let store: InMemoryShoeStore;

  beforeEach(() => {
    store = new InMemoryShoeStore();
  });

  async function run(terminal: ScriptedTerminal): Promise<void> {
    const menu = new ShoeMenu(
      {
        terminal,
        selector: new InteractiveSelector(new ShoeSelector(store), terminal),
        mutator: new ShoeMutator(store),
        queries: new InventoryQueries(store),
      },
      OWNER
    );
    await menu.run();
  }

  it('should exit on choice 6', async () => {
    const terminal = new ScriptedTerminal(['6']);

    await run(terminal);

    expect(terminal.output).toEqual([
      'Welcome to the Shoe Menu',
      '1. Add a shoe',
      '2. View all shoes',
      '3. View a specific shoe',
      '4. Edit a shoe',
      '5. Delete a shoe',
      '6. Exit',
      'Exiting Shoe Menu...',
    ]);
  });

  it('should stay in the menu after an invalid choice and exit at end of input', async () => {
    const terminal = new ScriptedTerminal(['9']);

    await run(terminal);

    expect(terminal.questions).toEqual(['Enter your choice: ', 'Enter your choice: ']);
    expect(terminal.output.slice(7, 10)).toEqual(['', INVALID_CHOICE, '']);
    expect(terminal.output.at(-1)).toBe('Exiting Shoe Menu...');
  });

  it('should add a shoe, reprompting invalid values', async () => {
    const terminal = new ScriptedTerminal(['1', 'Nike', 'AirMax90', 'Bacon', 'abc', '9.5', '120', '', 'New', '6']);

    await run(terminal);

    expect(store.all()).toEqual([{ id: 1, userId: OWNER, ...bacon, image: null }]);
    expect(terminal.output).toContain("Error: 'abc' is not a valid number. Please try again.");
    expect(terminal.output).toContain('Shoe added to your collection!');
    expect(terminal.questions.slice(4, 6)).toEqual(['Enter the size of your shoe: ', 'Enter the size of your shoe: ']);
  });

  it('should list the grouped collection', async () => {
    store.seed(OWNER, bacon);
    store.seed(OWNER, bacon);
    store.seed(OWNER, { ...bacon, brand: 'Puma', model: 'Suede' });
    const terminal = new ScriptedTerminal(['2', '6']);

    await run(terminal);

    expect(terminal.output.slice(7, 13)).toEqual([
      'Grabbing all of your shoes from the database...',
      '',
      ' brand | model | quantity',
      'Nike | AirMax90 | 2',
      'Puma | Suede | 1',
      '',
    ]);
  });

  it('should report a storage failure and return to the menu', async () => {
    store.failNext('summarize', new StorageError('syntax error'));
    const terminal = new ScriptedTerminal(['2', '6']);

    await run(terminal);

    expect(terminal.errors).toEqual(['❌ Database error occurred', 'The shoe was not retrieved']);
    expect(terminal.output.at(-1)).toBe('Exiting Shoe Menu...');
  });

  it('should show one shoe', async () => {
    store.seed(OWNER, bacon);
    const terminal = new ScriptedTerminal(['3', 'Nike', 'AirMax90', '1', '6']);

    await run(terminal);

    expect(terminal.output).toContain('Shoe Details: Nike, AirMax90, Bacon, 9.5, $120.00, bacon.jpg, New');
  });

  describe('edit', () => {
    it('should apply several edits until Done', async () => {
      store.seed(OWNER, bacon);
      const terminal = new ScriptedTerminal(['4', 'Nike', 'AirMax90', '1', '9', '1', 'Adidas', '6', '', '8', '6']);

      await run(terminal);

      expect(store.all()).toEqual([{ id: 1, userId: OWNER, ...bacon, brand: 'Adidas', image: null }]);
      expect(terminal.output).toContain("Brand updated successfully to be 'Adidas'");
      const invalid = terminal.output.indexOf(INVALID_CHOICE);
      expect(terminal.output.slice(invalid, invalid + 4)).toEqual([
        INVALID_CHOICE,
        '',
        'Shoe Details: Nike, AirMax90, Bacon, 9.5, $120.00, bacon.jpg, New',
        '',
      ]);
      expect(terminal.questions).toContain('Enter the new image filename (leave blank to remove it): ');
    });

    it('should keep the edit menu open after a storage failure', async () => {
      store.seed(OWNER, bacon);
      store.failNext('updateField', new StorageConnectivityError());
      const terminal = new ScriptedTerminal(['4', 'Nike', 'AirMax90', '1', '1', 'Adidas', '8', '6']);

      await run(terminal);

      expect(terminal.errors).toEqual(['❌ Database connection error', 'Please try again']);
      expect(store.all()[0].brand).toBe('Nike');
      expect(terminal.remaining).toBe(0);
      expect(terminal.output.at(-1)).toBe('Exiting Shoe Menu...');
    });

    it('should stop when the shoe vanished before the write', async () => {
      store.seed(OWNER, bacon);
      const terminal = new (class extends ScriptedTerminal {
        override async ask(question: string): Promise<string | null> {
          if (question === 'Enter the new brand name: ') {
            store.removeOwner(OWNER);
          }
          return super.ask(question);
        }
      })(['4', 'Nike', 'AirMax90', '1', '1', 'Adidas', '6']);

      await run(terminal);

      expect(terminal.output).toContain('That shoe no longer exists; nothing was updated');
      expect(store.all()).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should delete only the representative record', async () => {
      store.seed(OWNER, bacon);
      const twin = store.seed(OWNER, bacon);
      const theirs = store.seed(OTHER_OWNER, bacon);
      const terminal = new ScriptedTerminal(['5', 'Nike', 'AirMax90', '1', '6']);

      await run(terminal);

      expect(terminal.output).toContain('Nike AirMax90 was deleted successfully');
      expect(store.all()).toEqual([twin, theirs]);
    });

    it('should do nothing when the collection is empty', async () => {
      const terminal = new ScriptedTerminal(['5', '6']);

      await run(terminal);

      expect(terminal.output).toContain('No shoes found in the database');
      expect(store.calls).toEqual(['countBrands']);
      expect(terminal.errors).toEqual([]);
    });
  });
});
