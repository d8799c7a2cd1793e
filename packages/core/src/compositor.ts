import type { BackgroundColorName, ChalkInstance } from "chalk";
import { visibleWidth } from "./ansi";
import { tint, type Color } from "./color";

const MARGIN = " ";
const GUTTER = "   ";
const SWATCH = "   ";

const NORMAL_BACKGROUNDS: readonly BackgroundColorName[] = [
	"bgBlack",
	"bgRed",
	"bgGreen",
	"bgYellow",
	"bgBlue",
	"bgMagenta",
	"bgCyan",
	"bgWhite",
];

const BRIGHT_BACKGROUNDS: readonly BackgroundColorName[] = [
	"bgBlackBright",
	"bgRedBright",
	"bgGreenBright",
	"bgYellowBright",
	"bgBlueBright",
	"bgMagentaBright",
	"bgCyanBright",
	"bgWhiteBright",
];

export interface ComposeOptions {
	art_color: Color | null;
	chalk: ChalkInstance;
}

export function paletteRows(chalk: ChalkInstance): [string, string] {
	const row = (names: readonly BackgroundColorName[]) => names.map((name) => chalk[name](SWATCH)).join("");
	return [row(NORMAL_BACKGROUNDS), row(BRIGHT_BACKGROUNDS)];
}

export function artWidth(art: readonly string[]): number {
	return art.reduce((max, row) => Math.max(max, visibleWidth(row)), 0);
}

/**
 * Place the stat column beside the art. The column is the rendered lines, a
 * blank separator and the two palette rows; the whole block is bracketed by
 * blank lines.
 */
export function composeBlock(
	lines: readonly string[],
	art: readonly string[],
	options: ComposeOptions,
): string[] {
	const column = [...lines, "", ...paletteRows(options.chalk)];

	if (art.length === 0) return ["", ...column, ""];

	const blank_art = " ".repeat(artWidth(art));
	const row_count = Math.max(art.length, column.length);
	const rows: string[] = [];

	for (let i = 0; i < row_count; i++) {
		const art_row = tint(options.chalk, art[i] ?? blank_art, options.art_color);
		rows.push(`${MARGIN}${art_row}${GUTTER}${column[i] ?? ""}`);
	}

	return ["", ...rows, ""];
}

/** Debug output: the rendered lines alone. */
export function composePlain(lines: readonly string[]): string[] {
	return [...lines];
}
