import type { BasicBlockRecord, DisassemblyInfoRecord, RawDisassembly } from "@bb-coverage/core";
import { z } from "zod";

const Address = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

export const BasicBlockRecordSchema: z.ZodType<BasicBlockRecord, z.ZodTypeDef, unknown> = z.object({
  start_addr: Address,
  end_addr: Address,
  function: z.string().nullish().transform((name: string | null | undefined): string => name ?? ""),
});

export const DisassemblyInfoRecordSchema: z.ZodType<DisassemblyInfoRecord, z.ZodTypeDef, unknown> = z.object({
  bbs: z.array(BasicBlockRecordSchema),
  base_addr: Address,
  end_addr: Address,
});

export const RawDisassemblySchema: z.ZodType<RawDisassembly, z.ZodTypeDef, unknown> = z.object({
  base_addr: Address,
  end_addr: Address,
  basic_blocks: z.array(BasicBlockRecordSchema),
});

export type SchemaResult<T> = {ok: true; value: T} | {ok: false; issues: string[]};

/**
 * Validates a value against a schema, returning the issues as
 * `path: message` strings on failure.
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): SchemaResult<T> {
  const result: z.SafeParseReturnType<unknown, T> = schema.safeParse(value);
  if (result.success) {
    return {ok: true, value: result.data};
  }
  const issues: string[] = result.error.issues.map((issue: z.ZodIssue): string => {
    const path: string = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${path}: ${issue.message}`;
  });
  return {ok: false, issues};
}
