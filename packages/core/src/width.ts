import { visibleWidth } from "./ansi";
import type { RenderItem, StatEntry, TitleSpec } from "./types";

export function statText(entry: StatEntry, glyph: string, placeholder: string): string {
	return `${entry.label}${glyph}${entry.value ?? placeholder}`;
}

/** Smallest width a title occupies on its own. */
export function titleFootprint(spec: TitleSpec, text: string): number {
	if (spec.style === "stacked") return visibleWidth(text);

	const caps = visibleWidth(spec.left_cap) + visibleWidth(spec.right_cap);
	if (text.length === 0) return caps + 1;
	return caps + 2 + visibleWidth(text);
}

function itemWidth(item: RenderItem, glyph: string, placeholder: string): number {
	switch (item.kind) {
		case "stat":
			return visibleWidth(statText(item.entry, glyph, placeholder));
		case "title":
			return titleFootprint(item.spec, item.text);
		case "unresolved":
			return 0;
	}
}

/**
 * Pass 1: the shared "content" width, the widest visible line across every
 * item in the list. Never below 1.
 */
export function computeContentWidth(
	items: readonly RenderItem[],
	glyph: string,
	placeholder: string,
): number {
	return items.reduce((max, item) => Math.max(max, itemWidth(item, glyph, placeholder)), 1);
}

export function resolveTitleWidth(spec: TitleSpec, text: string, content_width: number): number {
	if (spec.width === "content") return content_width;
	if (spec.width === "title") return Math.max(1, titleFootprint(spec, text));
	return Math.max(1, spec.width.fixed);
}
