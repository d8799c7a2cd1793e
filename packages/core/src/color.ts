import { ok, err, type Result } from "@f0rbit/corpus";
import type { ChalkInstance, ForegroundColorName } from "chalk";
import { stripAnsi } from "./ansi";
import type { WarningSink } from "./log";

export type Color =
	| { kind: "named"; name: ForegroundColorName }
	| { kind: "rgb"; r: number; g: number; b: number };

export type ColorError =
	| { kind: "invalid_hex"; token: string }
	| { kind: "unknown_color"; token: string };

// ── Named palette ──

const NAMED_COLORS: Record<string, ForegroundColorName> = {
	black: "black",
	red: "red",
	green: "green",
	yellow: "yellow",
	blue: "blue",
	magenta: "magenta",
	cyan: "cyan",
	white: "whiteBright",
	grey: "white",
	gray: "white",
	dark_red: "red",
	dark_green: "green",
	dark_yellow: "yellow",
	dark_blue: "blue",
	dark_magenta: "magenta",
	dark_cyan: "cyan",
	dark_grey: "blackBright",
	dark_gray: "blackBright",
	bright_black: "blackBright",
	bright_red: "redBright",
	bright_green: "greenBright",
	bright_yellow: "yellowBright",
	bright_blue: "blueBright",
	bright_magenta: "magentaBright",
	bright_cyan: "cyanBright",
	bright_white: "whiteBright",
};

const HEX_PATTERN = /^[0-9a-f]{6}$/;

// ── Parsing ──

export function parseHex(token: string): Result<Color, ColorError> {
	const hex = token.slice(1);
	if (!HEX_PATTERN.test(hex)) return err({ kind: "invalid_hex", token });
	return ok({
		kind: "rgb",
		r: parseInt(hex.slice(0, 2), 16),
		g: parseInt(hex.slice(2, 4), 16),
		b: parseInt(hex.slice(4, 6), 16),
	});
}

/** `null` is an explicit "do not colorize". */
export function parseColor(token: string): Result<Color | null, ColorError> {
	const normalized = token.trim().toLowerCase();
	if (normalized === "none") return ok(null);
	if (normalized.startsWith("#")) return parseHex(normalized);

	const name = NAMED_COLORS[normalized];
	if (name === undefined) return err({ kind: "unknown_color", token });
	return ok({ kind: "named", name });
}

export function describeColorError(error: ColorError): string {
	switch (error.kind) {
		case "invalid_hex":
			return `invalid hex color '${error.token}' (expected #RRGGBB)`;
		case "unknown_color":
			return `unknown color '${error.token}'`;
	}
}

export function resolveColor(token: string, sink: WarningSink, context: string): Color | null {
	const result = parseColor(token);
	if (result.ok) return result.value;
	sink.warn(`${context}: ${describeColorError(result.error)}, rendering without color`);
	return null;
}

// ── Application ──

/**
 * Color `text`. A null color passes the text through with its own styling;
 * a concrete color replaces whatever styling the text already carries.
 */
export function paint(chalk: ChalkInstance, text: string, color: Color | null): string {
	if (color === null || text.length === 0) return text;
	const plain = stripAnsi(text);
	if (color.kind === "rgb") return chalk.rgb(color.r, color.g, color.b)(plain);
	return chalk[color.name](plain);
}

/** Wrap `text` in a color while keeping any styling already inside it. */
export function tint(chalk: ChalkInstance, text: string, color: Color | null): string {
	if (color === null || text.length === 0) return text;
	if (color.kind === "rgb") return chalk.rgb(color.r, color.g, color.b)(text);
	return chalk[color.name](text);
}
