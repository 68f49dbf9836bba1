/**
 * Friendly Errors
 *
 * Parse YAML or JSON text and validate it against a Zod schema, with
 * human-readable error details instead of raw parser/Zod output.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, KitConfigSchema.partial(), "nacos.yaml");
 * if (!result.success) {
 *   throw new ConfigError(result.error.message, result.error.details);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "json" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function failure(type: ParseErrorType, message: string, details: string[]): ParseResult<never> {
  return { success: false, error: { type, message, details } };
}

function errorText(err: unknown): string {
  // YAML errors carry a code frame after the first line
  const text = err instanceof Error ? err.message : String(err);
  return text.split("\n")[0] ?? text;
}

/**
 * Validate an already-parsed value against a Zod schema.
 */
export function safeValidate<Output, Input = Output>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  context?: string
): ParseResult<Output> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return failure("validation", `Invalid ${context ?? "data"}`, formatZodIssues(result.error));
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const where = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    const heading = err instanceof YAMLParseError ? "Invalid YAML syntax" : "Failed to parse YAML";
    return failure("yaml", `${heading}${where}`, [errorText(err)]);
  }

  return safeValidate(raw, schema, `configuration${where}`);
}

/**
 * Parse a JSON response body and validate against a Zod schema.
 *
 * @param context - What the body is, e.g. "instance list response"
 */
export function safeParseJson<Output, Input = Output>(
  text: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  context: string
): ParseResult<Output> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return failure("json", `Invalid JSON in ${context}`, [errorText(err)]);
  }

  return safeValidate(raw, schema, context);
}
