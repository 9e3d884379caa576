import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { BackendRoute } from "../backend/routes.js";

/** Longest natural-language question forwarded to the backend. */
export const MAX_USER_QUERY_LENGTH = 5_000;

/** Budget of the connectivity check run by `health_check`. */
export const HEALTH_CHECK_TIMEOUT_MS = 5_000;

/**
 * Deadline of the `health_check` invocation itself. It outlasts the connectivity check so a
 * hanging backend is reported inside the health report.
 */
export const HEALTH_CHECK_INVOCATION_TIMEOUT_MS = HEALTH_CHECK_TIMEOUT_MS + 1_000;

/** Columns requested from the metadata endpoint, in the order it expects them. */
export const METADATA_COLUMNS = [
  "description",
  "column_name",
  "column_alias",
  "column_type",
  "unit",
  "column_datatype_name",
  "date_format",
] as const;

/** JSON Schema advertised through `tools/list`. */
export interface ToolInputSchema {
  readonly type: "object";
  readonly properties: Record<string, unknown>;
  readonly required?: string[];
  readonly additionalProperties?: boolean;
}

/** Hints forwarded verbatim as MCP tool annotations. */
export interface ToolAnnotations {
  readonly title: string;
  readonly readOnlyHint: boolean;
  readonly destructiveHint: boolean;
  readonly idempotentHint: boolean;
  readonly openWorldHint: boolean;
}

/** What a validated invocation should do. */
export type ToolPlan =
  | { readonly kind: "backend"; readonly route: BackendRoute }
  | { readonly kind: "health"; readonly checkTimeoutMs: number };

export type ToolPreparation =
  | { readonly ok: true; readonly plan: ToolPlan }
  | { readonly ok: false; readonly error: z.ZodError };

/** Catalogue entry with its input type erased behind {@link prepare}. */
export interface CatalogTool {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly annotations: ToolAnnotations;
  /** Per-tool deadline overriding the configured request timeout. */
  readonly timeoutMs?: number;
  /** Validates raw arguments and derives the plan; never touches the network. */
  prepare(args: unknown): ToolPreparation;
}

interface ToolDefinition<Schema extends z.ZodTypeAny> {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly schema: Schema;
  readonly plan: (input: z.output<Schema>) => ToolPlan;
  readonly timeoutMs?: number;
}

const userQuerySchema = z
  .string({ required_error: "userQuery is required", invalid_type_error: "userQuery must be a string" })
  .refine((value) => value.trim().length > 0, { message: "userQuery must be non-empty" })
  .refine((value) => value.trim().length <= MAX_USER_QUERY_LENGTH, {
    message: `userQuery must be at most ${MAX_USER_QUERY_LENGTH} characters`,
  })
  .describe("Natural-language question about the dataset");

const schemaIdSchema = z
  .number({ required_error: "schemaId is required", invalid_type_error: "schemaId must be an integer" })
  .int({ message: "schemaId must be an integer" })
  .positive({ message: "schemaId must be a positive integer" })
  .describe("Identifier of the dataset schema to analyse");

/** Fields are validated in declaration order; unknown fields are ignored. */
const analyticsInputSchema = z.object({ userQuery: userQuerySchema, schemaId: schemaIdSchema });
const metadataInputSchema = z.object({ schemaId: schemaIdSchema });
const emptyInputSchema = z.object({});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toInputSchema(schema: z.ZodTypeAny): ToolInputSchema {
  const generated: unknown = zodToJsonSchema(schema, { $refStrategy: "none", target: "jsonSchema7" });
  if (!isRecord(generated)) {
    return { type: "object", properties: {} };
  }
  const properties = isRecord(generated.properties) ? { ...generated.properties } : {};
  const required = Array.isArray(generated.required)
    ? generated.required.filter((entry): entry is string => typeof entry === "string")
    : [];
  return { type: "object", properties, ...(required.length > 0 ? { required } : {}) };
}

function defineTool<Schema extends z.ZodTypeAny>(definition: ToolDefinition<Schema>): CatalogTool {
  return {
    name: definition.name,
    title: definition.title,
    description: definition.description,
    inputSchema: toInputSchema(definition.schema),
    annotations: {
      title: definition.title,
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: true,
    },
    ...(definition.timeoutMs !== undefined ? { timeoutMs: definition.timeoutMs } : {}),
    prepare(args) {
      const parsed = definition.schema.safeParse(args ?? {});
      if (!parsed.success) {
        return { ok: false, error: parsed.error };
      }
      return { ok: true, plan: definition.plan(parsed.data) };
    },
  };
}

interface AnalyticsEndpoint {
  readonly name: string;
  readonly endpoint: string;
  readonly title: string;
  readonly description: string;
  readonly responseType?: BackendRoute["responseType"];
}

/** Analytics tools forwarded to the AI engine with `{userQuery, schemaId}`. */
const ANALYTICS_TOOLS: readonly AnalyticsEndpoint[] = [
  {
    name: "nlq_to_data",
    endpoint: "nlq-to-data",
    title: "Natural Language Query",
    description:
      "Answers a natural-language question about a dataset by translating it into a query and returning the matching rows.",
    responseType: "stream",
  },
  {
    name: "get_trend_data",
    endpoint: "get-trend-data",
    title: "Analyze Trend Data",
    description: "Identifies how a measure evolves over time and summarises the direction and strength of the trend.",
  },
  {
    name: "get_prediction_data",
    endpoint: "get-prediction-data",
    title: "Forecast Data",
    description: "Forecasts future values of a measure from its historical series.",
  },
  {
    name: "get_outlier_data",
    endpoint: "get-outlier-data",
    title: "Detect Outliers",
    description: "Finds data points that deviate significantly from the expected pattern.",
  },
  {
    name: "get_correlation_data",
    endpoint: "get-correlation-data",
    title: "Analyze Correlation",
    description: "Measures how strongly two or more measures move together.",
  },
  {
    name: "get_change_data",
    endpoint: "get-change-data",
    title: "Analyze Change",
    description: "Explains what drove the change of a measure between two periods.",
  },
  {
    name: "get_pareto_data",
    endpoint: "get-pareto-data",
    title: "Pareto Analysis",
    description: "Ranks contributors to a measure and highlights the few that account for most of it.",
  },
];

function analyticsTool(entry: AnalyticsEndpoint): CatalogTool {
  return defineTool({
    name: entry.name,
    title: entry.title,
    description: entry.description,
    schema: analyticsInputSchema,
    plan: (input) => ({
      kind: "backend",
      route: {
        method: "POST",
        service: "ai-engine",
        endpoint: entry.endpoint,
        payload: { userQuery: input.userQuery, schemaId: input.schemaId },
        responseType: entry.responseType ?? "json",
      },
    }),
  });
}

/** Immutable catalogue of every tool the gateway exposes, in listing order. */
export const TOOL_CATALOG: readonly CatalogTool[] = Object.freeze([
  ...ANALYTICS_TOOLS.map(analyticsTool),
  defineTool({
    name: "get_dataset_metadata",
    title: "List Datasets",
    description: "Lists the datasets (domains and schemas) available to the configured client.",
    schema: emptyInputSchema,
    plan: () => ({
      kind: "backend",
      route: { method: "GET", service: "askme-manager", endpoint: "get-domain", responseType: "json" },
    }),
  }),
  defineTool({
    name: "get_metadata_info",
    title: "Describe Dataset Columns",
    description: "Returns the column definitions (names, aliases, types, units, date formats) of a dataset schema.",
    schema: metadataInputSchema,
    plan: (input) => ({
      kind: "backend",
      route: {
        method: "POST",
        service: "askme-manager",
        endpoint: `metadata/get/${input.schemaId}`,
        payload: { data: { columns: [...METADATA_COLUMNS], domainId: input.schemaId } },
        responseType: "json",
      },
    }),
  }),
  defineTool({
    name: "health_check",
    title: "Health Check",
    description: "Reports the gateway status and whether the analytics backend is reachable.",
    schema: emptyInputSchema,
    plan: () => ({ kind: "health", checkTimeoutMs: HEALTH_CHECK_TIMEOUT_MS }),
    timeoutMs: HEALTH_CHECK_INVOCATION_TIMEOUT_MS,
  }),
]);
