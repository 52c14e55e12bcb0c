import { z } from "zod";

import { SubmissionValidationError, type MappingSpec } from "./types";

export const DEFAULT_VALUE_TYPE = "bid";

const optionalColumn = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const mappingSpecSchema = z.object({
  name_column: z.string({ required_error: "name_column is required" }).trim().min(1, "name_column is required"),
  date_column: optionalColumn,
  quantity_column: optionalColumn,
  value_groups: z
    .array(
      z.object({
        column: z.string().trim().min(1, "value group column is required"),
        partner: z.string().trim().min(1, "value group partner is required"),
        value_type: optionalColumn,
      }),
      { required_error: "at least one value group is required" }
    )
    .min(1, "at least one value group is required"),
});

/**
 * Validates a submitted column mapping. Throws SubmissionValidationError so
 * that no task is created for a malformed mapping.
 */
export function parseMappingSpec(input: unknown): MappingSpec {
  const parsed = mappingSpecSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new SubmissionValidationError(`Invalid column mapping: ${issues.join("; ")}`, { issues });
  }

  const spec = parsed.data;
  return {
    nameColumn: spec.name_column,
    dateColumn: spec.date_column,
    quantityColumn: spec.quantity_column,
    valueGroups: spec.value_groups.map((group) => ({
      column: group.column,
      partner: group.partner,
      valueType: group.value_type ?? DEFAULT_VALUE_TYPE,
    })),
  };
}

/**
 * Columns named by the mapping that the source does not have.
 */
export function missingColumns(mapping: MappingSpec, columns: string[]): string[] {
  const available = new Set(columns);
  const wanted = [
    mapping.nameColumn,
    mapping.dateColumn,
    mapping.quantityColumn,
    ...mapping.valueGroups.map((group) => group.column),
  ].filter((column): column is string => Boolean(column));
  return Array.from(new Set(wanted)).filter((column) => !available.has(column));
}
