import stringWidth from "string-width";
import stripAnsi from "strip-ansi";

export { stripAnsi };

/** Terminal columns a string occupies once styling sequences are discarded. */
export function visibleWidth(text: string): number {
	return stringWidth(text);
}

/**
 * Repeat `pattern` end-to-end and cut the result to exactly `width` columns.
 * A wide glyph that would straddle the edge is replaced by a space.
 */
export function repeatPattern(pattern: string, width: number): string {
	if (width <= 0) return "";
	const plain = stripAnsi(pattern);
	if (visibleWidth(plain) === 0) return " ".repeat(width);

	const glyphs = [...plain];
	let out = "";
	let used = 0;
	let i = 0;
	while (used < width) {
		const glyph = glyphs[i % glyphs.length] ?? " ";
		const w = visibleWidth(glyph);
		if (used + w > width) {
			out += " ".repeat(width - used);
			break;
		}
		out += glyph;
		used += w;
		i++;
	}
	return out;
}
