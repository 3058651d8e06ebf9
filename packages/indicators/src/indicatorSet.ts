import fs from "node:fs";
import { z } from "zod";
import {
	createLogger,
	resolveIndicatorSetPath,
	type Candle,
	type IndicatorConfigDyn,
	type IndicatorInstanceDyn,
	type IndicatorResult,
	type OHLCV,
} from "@indicore/core";
import { configureIndicator, parseDescriptionText } from "./description";

const logger = createLogger("indicator-set");

export type IndicatorSetResults = Record<string, IndicatorResult>;

/**
 * Labelled collection of indicators of any kind, driven together.
 */
export class IndicatorSet<T extends OHLCV = Candle> {
	private readonly entries = new Map<string, IndicatorConfigDyn<T>>();

	add(label: string, config: IndicatorConfigDyn<T>): this {
		if (this.entries.has(label)) {
			throw new Error(`Duplicate indicator label: ${label}`);
		}
		this.entries.set(label, config);
		return this;
	}

	get(label: string): IndicatorConfigDyn<T> | undefined {
		return this.entries.get(label);
	}

	labels(): string[] {
		return [...this.entries.keys()];
	}

	get size(): number {
		return this.entries.size;
	}

	/** Seeds every indicator with `seed`; fails on the first rejection. */
	init(seed: T): IndicatorSetInstance<T> {
		const instances = new Map<string, IndicatorInstanceDyn<T>>();
		for (const [label, config] of this.entries) {
			instances.set(label, config.init(seed));
		}
		return new IndicatorSetInstance(instances);
	}

	over(inputs: readonly T[]): Record<string, IndicatorResult[]> {
		return Object.fromEntries(
			[...this.entries].map(([label, config]) => [label, config.over(inputs)])
		);
	}
}

export class IndicatorSetInstance<T extends OHLCV = Candle> {
	constructor(private readonly instances: Map<string, IndicatorInstanceDyn<T>>) {}

	// fromEntries defines own keys, so a "__proto__" label stays a label.
	next(candle: T): IndicatorSetResults {
		return Object.fromEntries(
			[...this.instances].map(([label, instance]) => [label, instance.next(candle)])
		);
	}

	over(inputs: readonly T[]): IndicatorSetResults[] {
		return inputs.map((candle) => this.next(candle));
	}
}

const parameterValueSchema = z
	.union([z.string(), z.number(), z.boolean()])
	.transform((value) => String(value));

const indicatorEntrySchema = z.union([
	z.string().min(1),
	z.object({
		name: z.string().min(1),
		label: z.string().min(1).optional(),
		params: z.record(parameterValueSchema).default({}),
	}),
]);

export const indicatorSetFileSchema = z.object({
	indicators: z.array(indicatorEntrySchema),
});

export type IndicatorSetFile = z.input<typeof indicatorSetFileSchema>;

/**
 * Builds a set from its JSON form. String entries are text descriptions
 * (`"SMA(period=3)"`); object entries name the indicator and its parameters.
 * Labels default to the indicator name.
 */
export const buildIndicatorSet = <T extends OHLCV = Candle>(
	definition: unknown
): IndicatorSet<T> => {
	const parsed = indicatorSetFileSchema.safeParse(definition);
	if (!parsed.success) {
		throw new Error(
			`Invalid indicator set: ${parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
				.join("; ")}`
		);
	}

	const set = new IndicatorSet<T>();
	for (const entry of parsed.data.indicators) {
		if (typeof entry === "string") {
			const description = parseDescriptionText(entry);
			set.add(description.name, configureIndicator<T>(description.name, description.params));
			continue;
		}
		const config = configureIndicator<T>(entry.name, Object.entries(entry.params));
		set.add(entry.label ?? entry.name, config);
	}
	return set;
};

/**
 * Reads an indicator set file. Without `filePath`, `INDICORE_INDICATOR_SET`
 * names the file.
 */
export const loadIndicatorSet = <T extends OHLCV = Candle>(
	filePath?: string
): IndicatorSet<T> => {
	const resolved = resolveIndicatorSetPath(filePath);
	const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
	const set = buildIndicatorSet<T>(raw);
	logger.info("indicator_set_loaded", { path: resolved, labels: set.labels() });
	return set;
};
