import { ok, err, type Result } from "@f0rbit/corpus";
import { visibleWidth, type WarningSink } from "@pacfetch/core";
import { readFile } from "node:fs/promises";
import { expandTilde } from "../config";

export const BUILTIN_ART = ["PACMAN_DEFAULT", "PACMAN_SMALL"] as const;
export type BuiltinArt = (typeof BUILTIN_ART)[number];

export type ArtError =
	| { kind: "read_failed"; path: string; cause: string }
	| { kind: "invalid_builtins"; cause: string };

const ART_FILE = new URL("./art.json", import.meta.url);

const isBuiltin = (name: string): name is BuiltinArt => BUILTIN_ART.some((b) => b === name);

const isRowList = (value: unknown): value is string[] =>
	Array.isArray(value) && value.every((row) => typeof row === "string");

let builtins: Record<BuiltinArt, string[]> | null = null;

async function loadBuiltins(): Promise<Result<Record<BuiltinArt, string[]>, ArtError>> {
	if (builtins) return ok(builtins);

	let parsed: unknown;
	try {
		parsed = JSON.parse(await readFile(ART_FILE, "utf-8"));
	} catch (e) {
		return err({ kind: "invalid_builtins", cause: e instanceof Error ? e.message : String(e) });
	}

	if (typeof parsed !== "object" || parsed === null) {
		return err({ kind: "invalid_builtins", cause: "expected an object of row lists" });
	}

	const loaded: Partial<Record<BuiltinArt, string[]>> = {};
	for (const name of BUILTIN_ART) {
		const rows: unknown = Reflect.get(parsed, name);
		if (!isRowList(rows)) return err({ kind: "invalid_builtins", cause: `missing ${name}` });
		loaded[name] = rows;
	}

	const { PACMAN_DEFAULT, PACMAN_SMALL } = loaded;
	if (!PACMAN_DEFAULT || !PACMAN_SMALL) return err({ kind: "invalid_builtins", cause: "incomplete art table" });

	builtins = { PACMAN_DEFAULT, PACMAN_SMALL };
	return ok(builtins);
}

// Tabs count as a single column
const rowWidth = (row: string): number => visibleWidth(row.replaceAll("\t", " "));

/** Pad every row on the right to the widest visible row. */
export function normalizeWidth(rows: readonly string[]): string[] {
	const widest = rows.reduce((max, row) => Math.max(max, rowWidth(row)), 0);
	return rows.map((row) => row + " ".repeat(widest - rowWidth(row)));
}

const splitRows = (text: string): string[] => {
	const rows = text.split(/\r?\n/);
	if (rows.length > 0 && rows[rows.length - 1] === "") rows.pop();
	return rows;
};

export async function readArtFile(path: string, home?: string): Promise<Result<string[], ArtError>> {
	const expanded = expandTilde(path, home);
	try {
		return ok(splitRows(await readFile(expanded, "utf-8")));
	} catch (e) {
		return err({ kind: "read_failed", path: expanded, cause: e instanceof Error ? e.message : String(e) });
	}
}

export function describeArtError(error: ArtError): string {
	return error.kind === "read_failed"
		? `could not load ascii art from '${error.path}': ${error.cause}`
		: `built-in ascii art is unavailable: ${error.cause}`;
}

const looksLikePath = (spec: string): boolean =>
	spec.startsWith("/") || spec.startsWith("~") || spec.startsWith(".");

async function builtinArt(name: BuiltinArt, sink: WarningSink): Promise<string[]> {
	const table = await loadBuiltins();
	if (!table.ok) {
		sink.warn(`${describeArtError(table.error)}, rendering without art`);
		return [];
	}
	return normalizeWidth(table.value[name]);
}

/**
 * Resolve `display.ascii`: `NONE`, raw multi-line art, a file path, or the
 * name of a built-in. Anything unrecognised is the default art.
 */
export async function loadArt(spec: string, sink: WarningSink, home?: string): Promise<string[]> {
	if (spec === "NONE") return [];
	if (spec.includes("\n")) return normalizeWidth(splitRows(spec));

	if (looksLikePath(spec)) {
		const file = await readArtFile(spec, home);
		if (file.ok) return normalizeWidth(file.value);
		sink.warn(`${describeArtError(file.error)}, using the default art`);
		return builtinArt("PACMAN_DEFAULT", sink);
	}

	if (isBuiltin(spec)) return builtinArt(spec, sink);

	sink.warn(`unknown ascii art '${spec}', using the default art`);
	return builtinArt("PACMAN_DEFAULT", sink);
}
