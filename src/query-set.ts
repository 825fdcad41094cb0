import { product, unravelIndex } from "./enumerator.js";
import { QuerySetError } from "./errors.js";

const SLOT = /%d/g;

export interface QuerySetDefinition {
  name: string;
  /** Query text with one `%d` slot per argument set, filled in declaration order */
  template: string;
  argSets: readonly (readonly number[])[];
  /** Run once before the first batch, e.g. to store a bitmap register */
  setup?: string;
  /** Run once after the last result is collected */
  teardown?: string;
}

/**
 * One generated query. `inputs` holds the argument values chosen for `index`.
 */
export interface QueryRecord {
  index: number;
  inputs: number[];
  raw: string;
}

/**
 * A template plus an argument grid, describing every combination of the grid
 * as a query. Queries are rendered on demand, so the grid is never expanded.
 */
export class QuerySet {
  readonly name: string;
  readonly template: string;
  readonly argSets: readonly (readonly number[])[];
  readonly setup?: string;
  readonly teardown?: string;
  readonly dimensions: number;
  readonly cardinalities: readonly number[];
  private readonly iterations: number;
  private readonly parts: readonly string[];

  constructor(definition: QuerySetDefinition) {
    this.name = definition.name;
    this.template = definition.template;
    this.argSets = definition.argSets.map((args) => Object.freeze([...args]));
    if (definition.setup) this.setup = definition.setup;
    if (definition.teardown) this.teardown = definition.teardown;
    this.dimensions = this.argSets.length;
    this.cardinalities = this.argSets.map((args) => args.length);

    const slots = definition.template.match(SLOT)?.length ?? 0;
    if (slots !== this.dimensions) {
      throw new QuerySetError(
        `Query set "${this.name}" has ${String(slots)} template slots but ${String(this.dimensions)} argument sets`
      );
    }
    for (const [k, args] of this.argSets.entries()) {
      const bad = args.find((v) => !Number.isSafeInteger(v));
      if (bad !== undefined) {
        throw new QuerySetError(
          `Query set "${this.name}" argument set ${String(k)} holds non-integer value ${String(bad)}`
        );
      }
    }

    const total = product(this.cardinalities);
    if (!Number.isSafeInteger(total)) {
      throw new QuerySetError(`Query set "${this.name}" has too many combinations`);
    }
    this.iterations = definition.template.trim() === "" ? 0 : total;
    this.parts = definition.template.split(SLOT);
  }

  /**
   * A query set that generates nothing
   */
  static empty(name: string): QuerySet {
    return new QuerySet({ name, template: "", argSets: [] });
  }

  size(): number {
    return this.iterations;
  }

  /**
   * Render the nth query as raw text
   */
  queryAt(n: number): string {
    return this.render(this.inputsAt(n));
  }

  /**
   * Render the nth query together with the inputs that produced it
   */
  recordAt(n: number): QueryRecord {
    const inputs = this.inputsAt(n);
    return { index: n, inputs, raw: this.render(inputs) };
  }

  toString(): string {
    return `${String(this.iterations)} queries of form:\n${this.template}`;
  }

  private inputsAt(n: number): number[] {
    if (!Number.isInteger(n) || n < 0 || n >= this.iterations) {
      throw new RangeError(
        `Query index ${String(n)} outside [0, ${String(this.iterations)}) for "${this.name}"`
      );
    }
    const offsets = unravelIndex(n, this.cardinalities);
    return offsets.map((offset, k) => this.argSets[k]?.[offset] ?? 0);
  }

  private render(inputs: readonly number[]): string {
    let raw = this.parts[0] ?? "";
    for (let k = 0; k < inputs.length; k++) {
      raw += String(inputs[k]) + (this.parts[k + 1] ?? "");
    }
    return `${raw}\n`;
  }
}
