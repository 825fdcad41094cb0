import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { z, ZodError } from "zod";
import { arange } from "./enumerator.js";
import { CatalogueError, errorMessage } from "./errors.js";
import { QuerySet } from "./query-set.js";
import type { Logger } from "./types.js";

// queries/ sits beside src/ when run from sources and beside dist/ when built
export const DEFAULT_CATALOGUE_PATH = ["../queries/ssb.yaml", "../../queries/ssb.yaml"]
  .map((candidate) => fileURLToPath(new URL(candidate, import.meta.url)))
  .reduce((found, path) => (existsSync(found) ? found : path));

// =============================================================================
// Schemas
// =============================================================================

const RangeSchema = z
  .object({
    range: z.union([
      z.tuple([z.number().int(), z.number().int()]),
      z.tuple([z.number().int(), z.number().int(), z.number().int().positive()]),
    ]),
  })
  .strict();

/**
 * One argument set: explicit values or an arithmetic range
 */
export const ArgSetSchema = z.union([z.array(z.number().int()), RangeSchema]);

export const TemplateSchema = z.object({
  template: z.string(),
  args: z.array(ArgSetSchema).default([]),
});

export const QuerySetEntrySchema = TemplateSchema.extend({
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
  setup: z.string().optional(),
  teardown: z.string().optional(),
});

export const CatalogueSchema = z.object({
  schema: z.object({ frames: z.array(z.string().min(1)).default([]) }).default({}),
  recordCount: TemplateSchema.optional(),
  querySets: z.record(z.string(), QuerySetEntrySchema),
});

export type ArgSetSpec = z.infer<typeof ArgSetSchema>;
export type QuerySetEntry = z.infer<typeof QuerySetEntrySchema>;
export type CatalogueData = z.infer<typeof CatalogueSchema>;

export interface CatalogueListing {
  name: string;
  description: string;
  tags: string[];
  size: number;
}

// =============================================================================
// Catalogue
// =============================================================================

export function expandArgSet(spec: ArgSetSpec): number[] {
  if (Array.isArray(spec)) return spec;
  const [start, stop, step] = spec.range;
  return arange(start, stop, step ?? 1);
}

/**
 * Named query sets plus the engine schema they run against.
 * Unknown names resolve to an empty query set.
 */
export class QueryCatalogue {
  private readonly logger: Logger;

  constructor(
    private readonly data: CatalogueData,
    logger?: Logger
  ) {
    this.logger = logger ?? console;
    // Build every entry once so a bad template fails at load time
    for (const name of this.names()) {
      this.get(name);
    }
  }

  /**
   * Parse YAML catalogue text
   */
  static parse(text: string, logger?: Logger): QueryCatalogue {
    let raw: unknown;
    try {
      raw = parse(text);
    } catch (error) {
      throw new CatalogueError(`Invalid catalogue YAML: ${errorMessage(error)}`, { cause: error });
    }
    try {
      return new QueryCatalogue(CatalogueSchema.parse(raw), logger);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new CatalogueError(`Invalid catalogue: ${issues}`, { cause: error });
      }
      throw error;
    }
  }

  static load(path: string = DEFAULT_CATALOGUE_PATH, logger?: Logger): QueryCatalogue {
    return QueryCatalogue.parse(readFileSync(path, "utf-8"), logger);
  }

  get frames(): string[] {
    return this.data.schema.frames;
  }

  names(): string[] {
    return Object.keys(this.data.querySets);
  }

  has(name: string): boolean {
    return Object.hasOwn(this.data.querySets, name);
  }

  get(name: string): QuerySet {
    const entry = this.has(name) ? this.data.querySets[name] : undefined;
    if (!entry) {
      this.logger.warn(`Unknown query set "${name}", nothing to run`);
      return QuerySet.empty(name);
    }
    return new QuerySet({
      name,
      template: entry.template,
      argSets: entry.args.map(expandArgSet),
      setup: entry.setup,
      teardown: entry.teardown,
    });
  }

  /**
   * Query set whose results summed give the dataset's record count
   */
  recordCountQuery(): QuerySet | undefined {
    const spec = this.data.recordCount;
    if (!spec) return undefined;
    return new QuerySet({
      name: "record-count",
      template: spec.template,
      argSets: spec.args.map(expandArgSet),
    });
  }

  list(filter: { names?: string[]; tag?: string } = {}): CatalogueListing[] {
    return Object.entries(this.data.querySets)
      .filter(([name]) => !filter.names?.length || filter.names.includes(name))
      .filter(([, entry]) => !filter.tag || entry.tags.includes(filter.tag))
      .map(([name, entry]) => ({
        name,
        description: entry.description,
        tags: entry.tags,
        size: this.get(name).size(),
      }));
  }
}
