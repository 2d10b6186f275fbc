/**
 * Filter definitions: binding a loosely typed filter call to a typed,
 * validated parameter struct.
 *
 * A call carries the piped subject, positional arguments and keyword
 * arguments, e.g. `'ap-southeast-1' | get_instances_by_tags(Cluster='web', state='running')`
 * becomes `{ subject: 'ap-southeast-1', kwargs: { Cluster: 'web', state: 'running' } }`.
 */

import { z } from "zod";
import type { AwsContext } from "@core/context";
import { InvalidQueryError } from "@core/errors";
import type { FilterValue } from "@/types";

/**
 * One invocation of a filter by the automation engine.
 */
export interface FilterCall {
  subject: unknown;
  args?: readonly unknown[];
  kwargs?: Readonly<Record<string, unknown>>;
}

/**
 * A filter bound to an AWS context, as registered with the engine.
 */
export type FilterFunction = (call: FilterCall) => Promise<FilterValue>;

/**
 * Declares how a filter's arguments bind and what it runs.
 */
export interface FilterSpec<P> {
  /** Parameter names the subject and positional arguments bind to, in order */
  positional: readonly string[];
  /** Validates the bound arguments; must be a `z.object` */
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  /** Collect keyword arguments that are not parameters into a `tags` record */
  collectTags?: boolean;
  run: (context: AwsContext, params: P) => Promise<FilterValue>;
}

/**
 * A filter definition that still needs a context.
 */
export interface FilterDefinition {
  readonly positional: readonly string[];
  bind(name: string, context: AwsContext): FilterFunction;
}

/** Tag values given as numbers or booleans in templates are compared as strings. */
export const tagValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * A tag constraint record. Validated as entries, since `z.record` drops a
 * `__proto__` key, which is a legal tag key.
 */
export const tagRecord = z
  .preprocess((value) => (isRecord(value) ? Object.entries(value) : value), z.array(z.tuple([z.string(), tagValue])))
  .transform((entries): Record<string, string> => Object.fromEntries(entries));

/** A required, non-empty string argument. */
export const required = z.string().trim().min(1);

/** A single string or a non-empty list of strings, normalized to a list. */
export const stringList = z
  .union([required, z.array(required).min(1)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

/** Booleans written as strings ("true"/"false") in templates are accepted. */
export const flag = z.union([
  z.boolean(),
  z.enum(["true", "false", "True", "False"]).transform((value) => value.toLowerCase() === "true"),
]);

export const instanceState = z.enum([
  "pending",
  "running",
  "stopping",
  "stopped",
  "shutting-down",
  "terminated",
]);

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Binds subject, positional and keyword arguments to parameter names.
 *
 * @throws {InvalidQueryError} On surplus positional arguments, duplicate
 *   bindings, or unknown keywords (when tags are not collected)
 */
export function bindArguments(
  name: string,
  positional: readonly string[],
  parameters: ReadonlySet<string>,
  collectTags: boolean,
  call: FilterCall
): Record<string, unknown> {
  const values = [call.subject, ...(call.args ?? [])];
  if (values.length > positional.length) {
    throw new InvalidQueryError(
      `${name} takes at most ${positional.length} positional argument(s), got ${values.length}`
    );
  }

  const bound: Record<string, unknown> = {};
  values.forEach((value, index) => {
    bound[positional[index]] = value;
  });

  const tags: Array<[string, unknown]> = [];
  for (const [key, value] of Object.entries(call.kwargs ?? {})) {
    if (Object.prototype.hasOwnProperty.call(bound, key)) {
      throw new InvalidQueryError(`${name} got multiple values for argument '${key}'`);
    }
    if (parameters.has(key)) {
      bound[key] = value;
    } else if (collectTags) {
      tags.push([key, value]);
    } else {
      throw new InvalidQueryError(`${name} got an unexpected keyword argument '${key}'`);
    }
  }

  if (collectTags) {
    bound.tags = Object.fromEntries(tags);
  }
  return bound;
}

/**
 * Creates a filter definition from its spec.
 */
export function defineFilter<P>(spec: FilterSpec<P>): FilterDefinition {
  if (!(spec.schema instanceof z.ZodObject)) {
    throw new TypeError("Filter schemas must be z.object schemas");
  }
  const collectTags = spec.collectTags ?? false;
  const parameters = new Set(Object.keys(spec.schema.shape));
  if (collectTags) {
    parameters.delete("tags");
  }

  return {
    positional: spec.positional,
    bind(name, context) {
      return async (call) => {
        const bound = bindArguments(name, spec.positional, parameters, collectTags, call);
        const parsed = spec.schema.safeParse(bound);
        if (!parsed.success) {
          throw new InvalidQueryError(`Invalid arguments for ${name}: ${formatIssues(parsed.error)}`, {
            cause: parsed.error,
          });
        }
        return spec.run(context, parsed.data);
      };
    },
  };
}
