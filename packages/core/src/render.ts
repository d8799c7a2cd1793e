import type { ChalkInstance } from "chalk";
import { resolveColor } from "./color";
import { describeDeclarationError } from "./declarations";
import { renderStat, renderTitle, type StatStyle } from "./line";
import type { WarningSink } from "./log";
import { resolveTitleText } from "./title";
import {
	STAT_LABELS,
	type Declaration,
	type RenderItem,
	type StatId,
	type StatEntry,
	type StatsSnapshot,
	type TitleSpec,
} from "./types";
import { computeContentWidth, resolveTitleWidth } from "./width";

export const PLACEHOLDER = "-";

export interface RenderOptions {
	glyph: string;
	label_color: string;
	titles: Readonly<Record<string, TitleSpec>>;
	legacy_title: TitleSpec;
	app_version: string;
	chalk: ChalkInstance;
	sink: WarningSink;
}

function statEntry(id: StatId, snapshot: StatsSnapshot): StatEntry {
	return snapshot.entries[id] ?? { id, label: STAT_LABELS[id], value: null };
}

function lookupTitle(titles: Readonly<Record<string, TitleSpec>>, name: string): TitleSpec | null {
	return Object.hasOwn(titles, name) ? (titles[name] ?? null) : null;
}

/**
 * Resolve declarations into render items, in declared order. Every reference
 * problem is reported here, once; the layout passes never warn about them.
 */
export function resolveItems(
	declarations: readonly Declaration[],
	snapshot: StatsSnapshot,
	options: RenderOptions,
): RenderItem[] {
	const titleItem = (spec: TitleSpec): RenderItem => ({
		kind: "title",
		spec,
		text: resolveTitleText(spec.text, snapshot.pacman_version, options.app_version),
	});

	return declarations.flatMap((declaration): RenderItem[] => {
		switch (declaration.kind) {
			case "stat":
				return [{ kind: "stat", entry: statEntry(declaration.id, snapshot) }];
			case "title": {
				const spec = lookupTitle(options.titles, declaration.name);
				if (spec === null) {
					options.sink.warn(`title '${declaration.name}' is not defined in display.titles, skipping`);
					return [{ kind: "unresolved", name: declaration.name }];
				}
				return [titleItem(spec)];
			}
			case "legacy_title":
				options.sink.warn("stat 'title' is deprecated, define display.titles.<name> and use 'title.<name>'");
				return [titleItem(options.legacy_title)];
			case "unknown":
				options.sink.warn(`${describeDeclarationError(declaration.error)}, skipping`);
				return [];
		}
	});
}

/** Pass 1 folds the items into a width, pass 2 maps the same items to lines. */
export function renderItems(items: readonly RenderItem[], options: RenderOptions): string[] {
	const content_width = computeContentWidth(items, options.glyph, PLACEHOLDER);
	const stat_style: StatStyle = {
		glyph: options.glyph,
		placeholder: PLACEHOLDER,
		label_color: resolveColor(options.label_color, options.sink, "display.label_color"),
	};

	return items.flatMap((item): string[] => {
		switch (item.kind) {
			case "stat":
				return [renderStat(item.entry, stat_style, options.chalk)];
			case "title": {
				const width = resolveTitleWidth(item.spec, item.text, content_width);
				const colors = {
					text: resolveColor(item.spec.text_color, options.sink, "title text_color"),
					line: resolveColor(item.spec.line_color, options.sink, "title line_color"),
				};
				return renderTitle(item.spec, item.text, width, colors, options.chalk);
			}
			case "unresolved":
				return [];
		}
	});
}

export function render(
	declarations: readonly Declaration[],
	snapshot: StatsSnapshot,
	options: RenderOptions,
): string[] {
	return renderItems(resolveItems(declarations, snapshot, options), options);
}
