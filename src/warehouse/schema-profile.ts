/**
 * Cliniq - Schema Profile
 *
 * Maps logical views/columns onto the physical tables and column expressions
 * of one warehouse deployment, and introspects which analytical features the
 * connected warehouse can actually execute.
 *
 * A profile document lives at `<directory>/<name>.json`:
 *
 *   {
 *     "views":    { "condition": { "table": "condition", "columns": { "code": "code" } } },
 *     "features": { "population.prevalence": { "requires": ["condition.code"] } }
 *   }
 *
 * Column expressions are either bare identifiers (checked against the live
 * table during introspection) or computed SQL fragments (trusted as written;
 * the profile author owns their physical validity).
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  ProfileNotFoundError,
  ProfileParseError,
  UnmappedColumnError,
  UnmappedViewError,
  errorMessage,
} from "../errors.ts";
import { silentLogger, type Logger } from "../logging/logger.ts";
import type { WarehouseConnection } from "./connection.ts";

const REFERENCE_PATTERN = /^([A-Za-z_][A-Za-z0-9_]*)\.([A-Za-z_][A-Za-z0-9_]*)$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const viewMappingSchema = z.object({
  table: z.string().min(1),
  columns: z.record(z.string().min(1)),
});

export const schemaMappingSchema = z
  .object({
    views: z.record(viewMappingSchema),
    features: z.record(
      z.object({
        requires: z.array(z.string().regex(REFERENCE_PATTERN, "must be a view.column reference")),
      }),
    ),
  })
  .superRefine((doc, ctx) => {
    for (const [feature, { requires }] of Object.entries(doc.features)) {
      requires.forEach((ref, i) => {
        const parsed = parseReference(ref);
        if (!parsed) return;
        const view = doc.views[parsed.view];
        if (!view) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["features", feature, "requires", i],
            message: `references unmapped view "${parsed.view}"`,
          });
        } else if (!Object.hasOwn(view.columns, parsed.column)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["features", feature, "requires", i],
            message: `references unmapped column "${ref}"`,
          });
        }
      });
    }
  });

export type SchemaMapping = z.infer<typeof schemaMappingSchema>;
export type ViewMapping = z.infer<typeof viewMappingSchema>;

export type CapabilityMap = ReadonlyMap<string, boolean>;

export interface ProfileDescription {
  profile: string;
  views: Record<string, string>;
  features: Record<string, boolean>;
  computed: boolean;
}

export interface LoadProfileOptions {
  name: string;
  directory: string;
  logger?: Logger;
}

export function parseReference(ref: string): { view: string; column: string } | undefined {
  const match = REFERENCE_PATTERN.exec(ref);
  if (!match) return undefined;
  return { view: match[1], column: match[2] };
}

/** True for a bare column name; false for computed expressions such as `COALESCE(a, b)`. */
export function isIdentifierExpression(expression: string): boolean {
  return IDENTIFIER_PATTERN.test(expression.trim());
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

export class SchemaProfile {
  private capabilityMap: CapabilityMap | undefined;

  private constructor(
    readonly name: string,
    private readonly mapping: SchemaMapping,
    private readonly logger: Logger,
  ) {}

  /**
   * Read and validate a profile document. Either a fully loaded profile is
   * returned or an error is thrown; there is no partially loaded state.
   */
  static async load(options: LoadProfileOptions): Promise<SchemaProfile> {
    const file = path.join(options.directory, `${options.name}.json`);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw new ProfileNotFoundError(options.name, file);
      }
      throw err;
    }
    return SchemaProfile.fromDocument(options.name, raw, options.logger);
  }

  /** Build a profile from document text (already read from disk or elsewhere). */
  static fromDocument(name: string, text: string, logger: Logger = silentLogger): SchemaProfile {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new ProfileParseError(name, [`invalid JSON: ${errorMessage(err)}`], err);
    }
    const parsed = schemaMappingSchema.safeParse(json);
    if (!parsed.success) throw new ProfileParseError(name, formatIssues(parsed.error));
    logger.info(
      `Loaded schema profile ${name}: ${Object.keys(parsed.data.views).length} views, ${Object.keys(parsed.data.features).length} features`,
    );
    return new SchemaProfile(name, parsed.data, logger);
  }

  // ── Resolution ──────────────────────────────────────────────────

  resolveTable(view: string): string {
    return this.view(view).table;
  }

  resolveColumn(view: string, column: string): string {
    const mapping = this.view(view);
    if (!Object.hasOwn(mapping.columns, column)) throw new UnmappedColumnError(this.name, view, column);
    return mapping.columns[column];
  }

  hasView(view: string): boolean {
    return Object.hasOwn(this.mapping.views, view);
  }

  hasColumn(view: string, column: string): boolean {
    return this.hasView(view) && Object.hasOwn(this.mapping.views[view].columns, column);
  }

  viewNames(): string[] {
    return Object.keys(this.mapping.views);
  }

  featureNames(): string[] {
    return Object.keys(this.mapping.features);
  }

  requirementsOf(feature: string): string[] {
    return this.mapping.features[feature]?.requires ?? [];
  }

  private view(view: string): ViewMapping {
    if (!Object.hasOwn(this.mapping.views, view)) throw new UnmappedViewError(this.name, view);
    return this.mapping.views[view];
  }

  // ── Capabilities ────────────────────────────────────────────────

  /**
   * Introspect the warehouse and rebuild the capability map. A table whose
   * columns cannot be listed counts as having none, so introspection of the
   * remaining tables still completes. The new map replaces the old one in a
   * single assignment.
   */
  async computeCapabilities(connection: WarehouseConnection): Promise<CapabilityMap> {
    const discovered = new Map<string, Set<string>>();
    for (const [view, mapping] of Object.entries(this.mapping.views)) {
      try {
        const columns = await connection.listColumns(mapping.table);
        discovered.set(view, new Set(columns.map((c) => c.toLowerCase())));
      } catch (err) {
        this.logger.warn(`Could not list columns of ${mapping.table} (view ${view}): ${errorMessage(err)}`);
        discovered.set(view, new Set());
      }
    }

    const next = new Map<string, boolean>();
    for (const [feature, { requires }] of Object.entries(this.mapping.features)) {
      next.set(feature, requires.every((ref) => this.referenceAvailable(ref, discovered)));
    }

    this.capabilityMap = next;
    const supported = [...next.values()].filter(Boolean).length;
    this.logger.info(`Capabilities for profile ${this.name}: ${supported}/${next.size} features supported`);
    return next;
  }

  private referenceAvailable(ref: string, discovered: Map<string, Set<string>>): boolean {
    const parsed = parseReference(ref);
    if (!parsed || !this.hasColumn(parsed.view, parsed.column)) return false;
    const expression = this.resolveColumn(parsed.view, parsed.column);
    // Computed expressions cannot be verified without parsing them.
    if (!isIdentifierExpression(expression)) return true;
    return discovered.get(parsed.view)?.has(expression.trim().toLowerCase()) ?? false;
  }

  isSupported(feature: string): boolean {
    return this.capabilityMap?.get(feature) ?? false;
  }

  hasComputedCapabilities(): boolean {
    return this.capabilityMap !== undefined;
  }

  capabilities(): Record<string, boolean> {
    return Object.fromEntries(this.capabilityMap ?? []);
  }

  describe(): ProfileDescription {
    return {
      profile: this.name,
      views: Object.fromEntries(Object.entries(this.mapping.views).map(([view, m]) => [view, m.table])),
      features: this.capabilities(),
      computed: this.hasComputedCapabilities(),
    };
  }
}
