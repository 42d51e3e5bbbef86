import { describe, it, expect, beforeEach } from 'vitest';
import { InteractiveSelector } from '../interactiveSelector.js';
import { ShoeSelector } from '../../../application/inventory/selector.js';
import { StorageError } from '../../../application/errors.js';
import { InMemoryShoeStore } from '../../../test-utils/inMemoryShoeStore.js';
import { ScriptedTerminal } from '../../../test-utils/scriptedTerminal.js';
import type { ShoeAttributes } from '../../../domain/inventory/shoe.js';

const OWNER = 1;

const bacon: ShoeAttributes = {
  brand: 'Nike',
  model: 'AirMax90',
  colorway: 'Bacon',
  size: 9.5,
  price: 120,
  image: null,
  condition: 'New',
};

describe('InteractiveSelector', () => {
  let store: InMemoryShoeStore;

  beforeEach(() => {
    store = new InMemoryShoeStore();
  });

  function selectorFor(terminal: ScriptedTerminal): InteractiveSelector {
    return new InteractiveSelector(new ShoeSelector(store), terminal);
  }

  it('should walk the funnel, reprompting on bad answers', async () => {
    store.seed(OWNER, bacon);
    const used = store.seed(OWNER, { ...bacon, condition: 'Used' });
    store.seed(OWNER, { ...bacon, brand: 'Adidas', model: 'Samba', colorway: 'Black', size: 10 });
    const terminal = new ScriptedTerminal(['Reebok', 'Nike', 'AirMax90', '3', '2']);

    const resolution = await selectorFor(terminal).resolve(OWNER);

    expect(resolution.kind === 'resolved' && resolution.shoe.id).toBe(used.id);
    expect(terminal.questions).toEqual([
      '\nSelect a brand: ',
      '\nSelect a brand: ',
      '\nSelect a model: ',
      '\nSelect a variant: ',
      '\nSelect a variant: ',
    ]);
    expect(terminal.output).toEqual([
      '',
      'Here are the brands of your shoes:',
      'Nike, 2 Pairs of Shoes',
      'Adidas, 1 Pair of Shoes',
      '',
      'Error: Please select a valid brand',
      '',
      'Here are the brands of your shoes:',
      'Nike, 2 Pairs of Shoes',
      'Adidas, 1 Pair of Shoes',
      '',
      'Here are the models of your shoes:',
      'AirMax90, 2 Pairs of Shoes',
      '',
      'Here are the variants of your shoes:',
      '1. AirMax90, Bacon, 9.5, New, 1 Pair of Shoes',
      '2. AirMax90, Bacon, 9.5, Used, 1 Pair of Shoes',
      '',
      'Error: Please select a valid variant',
      '',
      'Here are the variants of your shoes:',
      '1. AirMax90, Bacon, 9.5, New, 1 Pair of Shoes',
      '2. AirMax90, Bacon, 9.5, Used, 1 Pair of Shoes',
      '',
      'Shoe Details: Nike, AirMax90, Bacon, 9.5, $120.00, No image available, Used',
      '',
    ]);
  });

  it('should stop without prompting when there are no shoes', async () => {
    const terminal = new ScriptedTerminal(['Nike']);

    const resolution = await selectorFor(terminal).resolve(OWNER);

    expect(resolution).toEqual({ kind: 'not-found', reason: 'No shoes found in the database' });
    expect(terminal.questions).toEqual([]);
    expect(terminal.output).toEqual(['No shoes found in the database']);
  });

  it('should cancel when input ends mid-funnel', async () => {
    store.seed(OWNER, bacon);
    const terminal = new ScriptedTerminal(['Nike']);

    expect(await selectorFor(terminal).resolve(OWNER)).toEqual({ kind: 'cancelled' });
    expect(store.calls).toEqual(['countBrands', 'countModels']);
  });

  it('should report a failed record lookup', async () => {
    store.seed(OWNER, bacon);
    store.failNext('findRepresentative', new StorageError('relation "shoes" does not exist'));
    const terminal = new ScriptedTerminal(['Nike', 'AirMax90', '1']);

    const resolution = await selectorFor(terminal).resolve(OWNER);

    expect(resolution.kind).toBe('not-found');
    expect(terminal.output.at(-1)).toBe('Unable to retrieve shoe: relation "shoes" does not exist');
  });
});
