import type {
  ModelStage,
  Resolution,
  SelectedVariant,
  ShoeSelector,
  StageResult,
  VariantStage,
} from '../../application/inventory/selector.js';
import type { UserId } from '../../domain/inventory/shoe.js';
import { formatCountLine, formatShoeDetails, formatVariantLine } from './render.js';
import type { Terminal } from './terminal.js';

/**
 * Re-show a stage's menu and feed answers to it until one is accepted.
 * Null when input ends.
 */
async function untilAccepted<T>(
  terminal: Terminal,
  show: () => void,
  question: string,
  attempt: (input: string) => StageResult<T> | Promise<StageResult<T>>
): Promise<T | null> {
  for (;;) {
    show();
    const input = await terminal.ask(question);
    if (input === null) {
      return null;
    }
    const result = await attempt(input);
    if (result.kind === 'valid') {
      return result.value;
    }
    terminal.print();
    terminal.print(result.reason);
  }
}

/**
 * Console front end of the selection funnel; owns every reprompt loop.
 */
export class InteractiveSelector {
  constructor(
    private selector: ShoeSelector,
    private terminal: Terminal
  ) {}

  async resolve(ownerId: UserId): Promise<Resolution> {
    const opened = await this.selector.openBrands(ownerId);
    if (opened.kind === 'not-found') {
      this.terminal.print(opened.reason);
      return opened;
    }

    const modelStage = await untilAccepted<ModelStage>(
      this.terminal,
      () => {
        this.terminal.print();
        this.terminal.print('Here are the brands of your shoes:');
        for (const { brand, count } of opened.brands) {
          this.terminal.print(formatCountLine(brand, count));
        }
      },
      '\nSelect a brand: ',
      (input) => this.selector.selectBrand(ownerId, input)
    );
    if (!modelStage) {
      return { kind: 'cancelled' };
    }

    const variantStage = await untilAccepted<VariantStage>(
      this.terminal,
      () => {
        this.terminal.print();
        this.terminal.print('Here are the models of your shoes:');
        for (const { model, count } of modelStage.models) {
          this.terminal.print(formatCountLine(model, count));
        }
      },
      '\nSelect a model: ',
      (input) => this.selector.selectModel(ownerId, modelStage.brand, input)
    );
    if (!variantStage) {
      return { kind: 'cancelled' };
    }

    const selected = await untilAccepted<SelectedVariant>(
      this.terminal,
      () => {
        this.terminal.print();
        this.terminal.print('Here are the variants of your shoes:');
        variantStage.variants.forEach((variant, index) => {
          this.terminal.print(formatVariantLine(index + 1, variantStage.model, variant));
        });
      },
      '\nSelect a variant: ',
      (input) => this.selector.selectVariant(variantStage, input)
    );
    if (!selected) {
      return { kind: 'cancelled' };
    }

    const resolution = await this.selector.resolveVariant(ownerId, selected);
    if (resolution.kind === 'resolved') {
      this.terminal.print();
      this.terminal.print(formatShoeDetails(resolution.shoe));
      this.terminal.print();
    } else if (resolution.kind === 'not-found') {
      this.terminal.print(resolution.reason);
    }
    return resolution;
  }
}
