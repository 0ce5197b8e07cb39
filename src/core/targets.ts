import { z } from "zod";

import { TargetError } from "./errors.js";
import type { ParsedTargets, RepoOptions } from "./types.js";

const pathValue = z.string().min(1);
const versionValue = z.union([pathValue, z.number().finite().transform(String)]);

const singleEntry = (label: string, value: z.ZodType<string, z.ZodTypeDef, unknown>) =>
  z
    .record(z.string().min(1), value)
    .refine((entry) => Object.keys(entry).length === 1, {
      message: `each ${label} entry must map exactly one package name`,
    });

const pkgsSchema = z.array(z.union([z.string().min(1), singleEntry("pkgs", versionValue)]));
const sourcesSchema = z.array(singleEntry("sources", pathValue));

export const repoOptionsSchema = z
  .object({
    fromRepo: z.string().optional(),
    repo: z.string().optional(),
    enableRepo: z.string().optional(),
    disableRepo: z.string().optional(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validates a loosely typed repo option bag; unknown keys are rejected.
 */
export function parseRepoOptions(input: unknown): RepoOptions {
  const result = repoOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new TargetError(`Invalid repository options: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export interface TargetInput {
  name?: string;
  pkgs?: unknown;
  sources?: unknown;
}

/**
 * Resolves what an install should act on.
 *
 * `pkgs` entries are a name or `{name: version}`; `sources` entries are
 * `{name: pathOrUri}`. Without either, `name` is a single unpinned target.
 * Returns undefined when nothing was requested.
 */
export function parseTargets(input: TargetInput): ParsedTargets | undefined {
  if (input.pkgs != null && input.sources != null) {
    throw new TargetError("Only one of pkgs and sources can be used");
  }

  if (input.pkgs != null) {
    const result = pkgsSchema.safeParse(input.pkgs);
    if (!result.success) {
      throw new TargetError(`Invalid pkgs: ${describeIssues(result.error)}`);
    }
    const params: Record<string, string | null> = {};
    for (const entry of result.data) {
      if (typeof entry === "string") {
        params[entry] = null;
      } else {
        Object.assign(params, entry);
      }
    }
    return { kind: "repository", params };
  }

  if (input.sources != null) {
    const result = sourcesSchema.safeParse(input.sources);
    if (!result.success) {
      throw new TargetError(`Invalid sources: ${describeIssues(result.error)}`);
    }
    const params: Record<string, string | null> = {};
    for (const entry of result.data) {
      Object.assign(params, entry);
    }
    return { kind: "file", params };
  }

  if (input.name) {
    return { kind: "repository", params: { [input.name]: null } };
  }

  return undefined;
}
