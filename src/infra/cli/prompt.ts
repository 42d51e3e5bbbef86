import type { InputParser } from '../../domain/inventory/fields.js';
import { shoeFieldParsers } from '../../domain/inventory/fields.js';
import type { ShoeAttributes, ShoeField } from '../../domain/inventory/shoe.js';
import type { Terminal } from './terminal.js';

/**
 * Ask until `parse` accepts the answer, printing each retry reason.
 * Null when input ends first. `secret` answers are not echoed.
 */
export async function promptUntilValid<T>(
  terminal: Terminal,
  question: string,
  parse: InputParser<T>,
  { secret = false }: { secret?: boolean } = {}
): Promise<T | null> {
  for (;;) {
    const raw = secret ? await terminal.askSecret(question) : await terminal.ask(question);
    if (raw === null) {
      return null;
    }
    const result = parse(raw);
    if (result.kind === 'valid') {
      return result.value;
    }
    terminal.print(result.reason);
  }
}

export interface FieldPrompt {
  label: string;
  add: string;
  edit: string;
}

export const FIELD_PROMPTS: Record<ShoeField, FieldPrompt> = {
  brand: {
    label: 'Brand',
    add: 'Enter the brand of your shoe: ',
    edit: 'Enter the new brand name: ',
  },
  model: {
    label: 'Model',
    add: 'Enter the model of your shoe: ',
    edit: 'Enter the new model name: ',
  },
  colorway: {
    label: 'Colorway',
    add: 'Enter the colorway of your shoe: ',
    edit: 'Enter the new colorway: ',
  },
  size: {
    label: 'Size',
    add: 'Enter the size of your shoe: ',
    edit: 'Enter the new size: ',
  },
  price: {
    label: 'Price',
    add: 'Enter the price of your shoe: ',
    edit: 'Enter the new price: ',
  },
  image: {
    label: 'Image',
    add: 'Enter the image filename of your shoe (optional, .jpg, .jpeg or .png): ',
    edit: 'Enter the new image filename (leave blank to remove it): ',
  },
  condition: {
    label: 'Condition',
    add: 'Enter the condition of your shoe (New, Used, Damaged, etc.): ',
    edit: 'Enter the updated condition (New, Used, Damaged, etc.): ',
  },
};

export async function promptShoeField<F extends ShoeField>(
  terminal: Terminal,
  field: F,
  mode: 'add' | 'edit'
): Promise<ShoeAttributes[F] | null> {
  const parse: InputParser<ShoeAttributes[F]> = shoeFieldParsers[field];
  return promptUntilValid(terminal, FIELD_PROMPTS[field][mode], parse);
}
