import { z } from "zod";
import { PRICE_SOURCES } from "../types";

/**
 * Per-indicator table of settable parameters: field name to the schema that
 * turns a string into that field's typed value. Fields left out of the table
 * cannot be set by name.
 */
export type ParameterSchema<TParams> = {
	[K in keyof TParams]?: z.ZodType<TParams[K], z.ZodTypeDef, unknown>;
};

export const integerParameter = (min: number, max = Number.MAX_SAFE_INTEGER) =>
	z
		.string()
		.trim()
		.regex(/^[+-]?\d+$/, "Expected an integer")
		.transform(Number)
		.pipe(z.number().int().min(min).max(max));

/** Longest lookback any indicator accepts; window buffers are sized from it. */
export const MAX_PERIOD = 100_000;

export const periodParameter = (min = 1) => integerParameter(min, MAX_PERIOD);

export const isValidPeriod = (value: number, min = 1): boolean =>
	Number.isInteger(value) && value >= min && value <= MAX_PERIOD;

export const numberParameter = (
	bounds: { gt?: number; lt?: number; min?: number; max?: number } = {}
) => {
	let schema = z.number().finite();
	if (bounds.gt !== undefined) schema = schema.gt(bounds.gt);
	if (bounds.lt !== undefined) schema = schema.lt(bounds.lt);
	if (bounds.min !== undefined) schema = schema.min(bounds.min);
	if (bounds.max !== undefined) schema = schema.max(bounds.max);
	return z
		.string()
		.trim()
		.min(1, "Expected a number")
		.transform(Number)
		.pipe(schema);
};

export const sourceParameter = () =>
	z.string().trim().toLowerCase().pipe(z.enum(PRICE_SOURCES));

export const describeIssues = (error: z.ZodError): string =>
	error.issues.map((issue) => issue.message).join("; ");
