import { describe, test, expect } from "vitest";
import { padAligned, renderStat, renderTitle, splitPadding } from "../src/line";
import { ansi16, makeStat, makeTitle, plain } from "./helpers";

const NO_COLORS = { text: null, line: null };

describe("splitPadding", () => {
	test("left keeps one column before the text", () => {
		expect(splitPadding(6, "left")).toEqual([1, 5]);
	});

	test("center puts the odd column on the right", () => {
		expect(splitPadding(5, "center")).toEqual([2, 3]);
	});

	test("right keeps one column after the text", () => {
		expect(splitPadding(6, "right")).toEqual([5, 1]);
	});

	test("nothing to split", () => {
		expect(splitPadding(0, "left")).toEqual([0, 0]);
		expect(splitPadding(0, "right")).toEqual([0, 0]);
	});
});

describe("padAligned", () => {
	test("pads per alignment", () => {
		expect(padAligned("abc", 7, "left")).toBe("abc    ");
		expect(padAligned("abc", 7, "center")).toBe("  abc  ");
		expect(padAligned("abcd", 7, "center")).toBe(" abcd  ");
		expect(padAligned("abc", 7, "right")).toBe("    abc");
	});

	test("never truncates", () => {
		expect(padAligned("abcdef", 3, "right")).toBe("abcdef");
	});
});

describe("renderTitle — stacked", () => {
	test("title width gives text and a matching separator", () => {
		expect(renderTitle(makeTitle(), "X", 1, NO_COLORS, plain)).toEqual(["X", "-"]);
	});

	test("text is aligned inside a wider line", () => {
		const spec = makeTitle({ align: "center" });
		expect(renderTitle(spec, "abc", 7, NO_COLORS, plain)).toEqual(["  abc  ", "-------"]);
	});

	test("overflowing text is emitted whole", () => {
		expect(renderTitle(makeTitle({ align: "right" }), "abcdef", 3, NO_COLORS, plain)).toEqual(["abcdef", "---"]);
	});

	test("multi-character patterns are cut to width", () => {
		expect(renderTitle(makeTitle({ line: "=-" }), "Hello", 5, NO_COLORS, plain)).toEqual(["Hello", "=-=-="]);
	});

	test("empty text emits only the separator", () => {
		expect(renderTitle(makeTitle(), "", 4, NO_COLORS, plain)).toEqual(["----"]);
	});
});

describe("renderTitle — embedded", () => {
	const boxed = (overrides: Parameters<typeof makeTitle>[0] = {}) =>
		makeTitle({ style: "embedded", line: "─", left_cap: "├", right_cap: "┤", ...overrides });

	test("empty text is all fill between the caps", () => {
		expect(renderTitle(boxed(), "", 7, NO_COLORS, plain)).toEqual(["├─────┤"]);
	});

	test("centered by default", () => {
		expect(renderTitle(boxed(), "Stats", 15, NO_COLORS, plain)).toEqual(["├─── Stats ───┤"]);
	});

	test("left and right alignment keep one fill column on the near side", () => {
		expect(renderTitle(boxed({ align: "left" }), "Stats", 15, NO_COLORS, plain)).toEqual(["├─ Stats ─────┤"]);
		expect(renderTitle(boxed({ align: "right" }), "Stats", 15, NO_COLORS, plain)).toEqual(["├───── Stats ─┤"]);
	});

	test("text wider than the line overflows without fill", () => {
		expect(renderTitle(boxed(), "Stats", 5, NO_COLORS, plain)).toEqual(["├ Stats ┤"]);
	});

	test("caps wider than the width leave no fill", () => {
		expect(renderTitle(boxed({ left_cap: "<<", right_cap: ">>" }), "", 2, NO_COLORS, plain)).toEqual(["<<>>"]);
	});
});

describe("renderTitle — color", () => {
	const styled = "\u001b[31mX\u001b[39m";

	test("none keeps styling already in the text", () => {
		const lines = renderTitle(makeTitle(), styled, 1, NO_COLORS, ansi16);
		expect(lines).toEqual([`\u001b[1m${styled}\u001b[22m`, "-"]);
	});

	test("a concrete text color overrides embedded styling", () => {
		const colors = { text: { kind: "named" as const, name: "yellow" as const }, line: null };
		const lines = renderTitle(makeTitle(), styled, 1, colors, ansi16);
		expect(lines).toEqual(["\u001b[1m\u001b[33mX\u001b[39m\u001b[22m", "-"]);
	});

	test("line color applies to the fill and caps only", () => {
		const spec = makeTitle({ style: "embedded", line: "=", left_cap: "[", right_cap: "]" });
		const colors = { text: null, line: { kind: "named" as const, name: "yellow" as const } };
		expect(renderTitle(spec, "", 4, colors, ansi16)).toEqual(["\u001b[33m[==]\u001b[39m"]);
	});
});

describe("renderStat", () => {
	const style = { glyph: ": ", placeholder: "-", label_color: null };

	test("label, glyph and value", () => {
		expect(renderStat(makeStat("installed", "1268"), style, plain)).toBe("Installed: 1268");
	});

	test("absent values use the placeholder", () => {
		expect(renderStat(makeStat("upgradable", null), style, plain)).toBe("Upgradable: -");
	});

	test("the label carries the label color in bold", () => {
		const colored = { ...style, label_color: { kind: "named" as const, name: "yellow" as const } };
		expect(renderStat(makeStat("installed", "1268"), colored, ansi16)).toBe(
			"\u001b[1m\u001b[33mInstalled\u001b[39m\u001b[22m: 1268",
		);
	});
});
