import type { ChalkInstance } from "chalk";
import { repeatPattern, visibleWidth } from "./ansi";
import { paint, type Color } from "./color";
import type { StatEntry, TitleAlign, TitleSpec } from "./types";

export interface TitleColors {
	text: Color | null;
	line: Color | null;
}

export function effectiveAlign(spec: TitleSpec): TitleAlign {
	if (spec.align !== null) return spec.align;
	return spec.style === "stacked" ? "left" : "center";
}

// ── Padding ──

export function splitPadding(total: number, align: TitleAlign): [number, number] {
	if (align === "center") {
		const left = Math.floor(total / 2);
		return [left, total - left];
	}
	if (align === "left") {
		const left = Math.min(1, total);
		return [left, total - left];
	}
	const right = Math.min(1, total);
	return [total - right, right];
}

export function padAligned(text: string, width: number, align: TitleAlign): string {
	const gap = width - visibleWidth(text);
	if (gap <= 0) return text;
	if (align === "left") return text + " ".repeat(gap);
	if (align === "right") return " ".repeat(gap) + text;
	const left = Math.floor(gap / 2);
	return " ".repeat(left) + text + " ".repeat(gap - left);
}

// ── Titles ──

function styleText(chalk: ChalkInstance, text: string, color: Color | null): string {
	return chalk.bold(paint(chalk, text, color));
}

function renderStacked(
	spec: TitleSpec,
	text: string,
	width: number,
	colors: TitleColors,
	chalk: ChalkInstance,
): string[] {
	const lines: string[] = [];
	if (text.length > 0) {
		const styled = styleText(chalk, text, colors.text);
		lines.push(padAligned(styled, width, effectiveAlign(spec)));
	}
	lines.push(paint(chalk, repeatPattern(spec.line, width), colors.line));
	return lines;
}

function renderEmbedded(
	spec: TitleSpec,
	text: string,
	width: number,
	colors: TitleColors,
	chalk: ChalkInstance,
): string[] {
	const inner = Math.max(0, width - visibleWidth(spec.left_cap) - visibleWidth(spec.right_cap));

	if (text.length === 0) {
		const border = spec.left_cap + repeatPattern(spec.line, inner) + spec.right_cap;
		return [paint(chalk, border, colors.line)];
	}

	const label = ` ${text} `;
	const remaining = Math.max(0, inner - visibleWidth(label));
	const [left_fill, right_fill] = splitPadding(remaining, effectiveAlign(spec));

	const left = paint(chalk, spec.left_cap + repeatPattern(spec.line, left_fill), colors.line);
	const right = paint(chalk, repeatPattern(spec.line, right_fill) + spec.right_cap, colors.line);
	return [`${left} ${styleText(chalk, text, colors.text)} ${right}`];
}

/** Pass 2: one title rendered at its resolved width. */
export function renderTitle(
	spec: TitleSpec,
	text: string,
	width: number,
	colors: TitleColors,
	chalk: ChalkInstance,
): string[] {
	if (spec.style === "stacked") return renderStacked(spec, text, width, colors, chalk);
	return renderEmbedded(spec, text, width, colors, chalk);
}

// ── Stats ──

export interface StatStyle {
	glyph: string;
	placeholder: string;
	label_color: Color | null;
}

export function renderStat(entry: StatEntry, style: StatStyle, chalk: ChalkInstance): string {
	const label = chalk.bold(paint(chalk, entry.label, style.label_color));
	return `${label}${style.glyph}${entry.value ?? style.placeholder}`;
}
