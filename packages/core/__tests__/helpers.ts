import type { Result } from "@f0rbit/corpus";
import { Chalk, type ChalkInstance } from "chalk";
import { createMemorySink, type MemorySink } from "../src/log";
import type { RenderOptions } from "../src/render";
import {
	defaultTitleSpec,
	STAT_LABELS,
	type StatEntry,
	type StatId,
	type StatsSnapshot,
	type TitleSpec,
} from "../src/types";

export const FIXED_CLOCK = () => new Date(2025, 0, 15, 9, 5, 3);

export const plain: ChalkInstance = new Chalk({ level: 0 });
export const ansi16: ChalkInstance = new Chalk({ level: 1 });
export const truecolor: ChalkInstance = new Chalk({ level: 3 });

export function makeTitle(overrides: Partial<TitleSpec> = {}): TitleSpec {
	return { ...defaultTitleSpec(), text_color: "none", ...overrides };
}

export function makeStat(id: StatId, value: string | null): StatEntry {
	return { id, label: STAT_LABELS[id], value };
}

export function makeSnapshot(entries: StatEntry[], pacman_version: string | null = null): StatsSnapshot {
	const snapshot: StatsSnapshot = { entries: {}, pacman_version };
	for (const entry of entries) snapshot.entries[entry.id] = entry;
	return snapshot;
}

export function makeOptions(
	overrides: Partial<RenderOptions> = {},
): RenderOptions & { sink: MemorySink } {
	return {
		glyph: ": ",
		label_color: "none",
		titles: {},
		legacy_title: makeTitle(),
		app_version: "0.4.0",
		chalk: plain,
		...overrides,
		sink: createMemorySink(FIXED_CLOCK),
	};
}

export function valueOf<T, E>(result: Result<T, E>): T | undefined {
	return result.ok ? result.value : undefined;
}
