import { ok, err, type Result } from "@f0rbit/corpus";
import {
	defaultConfig,
	defaultTitleSpec,
	parseTitleText,
	type PacfetchConfig,
	type TitleAlign,
	type TitleSpec,
	type TitleStyle,
	type TitleWidth,
	type WarningSink,
} from "@pacfetch/core";
import { existsSync } from "node:fs";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { homedir } from "node:os";

export const APP_VERSION = "0.4.0";

export type ConfigError =
	| { kind: "parse_error"; path: string; cause: string }
	| { kind: "write_error"; path: string; cause: string };

// ── Paths ──

/** Home of the invoking user, the original one when run through sudo. */
export function userHome(env: NodeJS.ProcessEnv = process.env): string {
	const sudo_user = env.SUDO_USER;
	if (sudo_user) {
		const sudo_home = join("/home", sudo_user);
		if (existsSync(sudo_home)) return sudo_home;
	}
	return homedir();
}

export const configDir = (home = userHome()): string => join(home, ".config", "pacfetch");
export const configPath = (home = userHome()): string => join(configDir(home), "config.json");
export const logPath = (home = userHome()): string => join(home, ".cache", "pacfetch", "pacfetch.log");

export const expandTilde = (p: string, home = userHome()): string =>
	p === "~" || p.startsWith("~/") ? join(home, p.slice(1)) : p;

// A path under a plain file is as absent as a missing one
const isMissing = (e: unknown): boolean =>
	e instanceof Error && "code" in e && (e.code === "ENOENT" || e.code === "ENOTDIR");

// ── Shape validation ──

type Raw = Record<string, unknown>;

const isRecord = (value: unknown): value is Raw =>
	typeof value === "object" && value !== null && !Array.isArray(value);

function field<T>(
	raw: Raw,
	key: string,
	path: string,
	fallback: T,
	accept: (value: unknown) => T | null,
	expected: string,
	sink: WarningSink,
): T {
	if (raw[key] === undefined || raw[key] === null) return fallback;
	const accepted = accept(raw[key]);
	if (accepted !== null) return accepted;
	sink.warn(`config: ${path}.${key} should be ${expected}, using the default`);
	return fallback;
}

const asString = (value: unknown): string | null => (typeof value === "string" ? value : null);

const asStyle = (value: unknown): TitleStyle | null =>
	value === "stacked" || value === "embedded" ? value : null;

const asAlign = (value: unknown): TitleAlign | null =>
	value === "left" || value === "center" || value === "right" ? value : null;

const asWidth = (value: unknown): TitleWidth | null => {
	if (value === "title" || value === "content") return value;
	if (typeof value === "number" && Number.isInteger(value) && value > 0) return { fixed: value };
	return null;
};

const asLine = (value: unknown): string | null =>
	typeof value === "string" && value.length > 0 ? value : null;

const asStringList = (value: unknown): string[] | null =>
	Array.isArray(value) && value.every((v) => typeof v === "string") ? value : null;

export function normalizeTitle(raw: unknown, path: string, sink: WarningSink): TitleSpec {
	const defaults = defaultTitleSpec();
	if (!isRecord(raw)) {
		if (raw !== undefined) sink.warn(`config: ${path} should be a table, using the default title`);
		return defaults;
	}

	const text = field(raw, "text", path, "default", asString, "a string", sink);
	const align = field<TitleAlign | null>(raw, "align", path, defaults.align, asAlign, `"left", "center" or "right"`, sink);

	return {
		text: parseTitleText(text),
		text_color: field(raw, "text_color", path, defaults.text_color, asString, "a color", sink),
		line_color: field(raw, "line_color", path, defaults.line_color, asString, "a color", sink),
		style: field(raw, "style", path, defaults.style, asStyle, `"stacked" or "embedded"`, sink),
		width: field(raw, "width", path, defaults.width, asWidth, `"title", "content" or a positive integer`, sink),
		align,
		line: field(raw, "line", path, defaults.line, asLine, "a non-empty string", sink),
		left_cap: field(raw, "left_cap", path, defaults.left_cap, asString, "a string", sink),
		right_cap: field(raw, "right_cap", path, defaults.right_cap, asString, "a string", sink),
	};
}

function normalizeTitles(raw: unknown, sink: WarningSink): Record<string, TitleSpec> | null {
	if (!isRecord(raw)) return null;
	const titles: Record<string, TitleSpec> = {};
	for (const [name, spec] of Object.entries(raw)) {
		titles[name] = normalizeTitle(spec, `display.titles.${name}`, sink);
	}
	return titles;
}

/** Every field falls back to its default on its own; nothing here fails. */
export function normalizeConfig(raw: unknown, sink: WarningSink): PacfetchConfig {
	const defaults = defaultConfig();
	const root: Raw = isRecord(raw) ? raw : {};
	const display: Raw = isRecord(root.display) ? root.display : {};
	const disk: Raw = isRecord(root.disk) ? root.disk : {};
	const d = defaults.display;

	return {
		display: {
			stats: field(display, "stats", "display", d.stats, asStringList, "a list of strings", sink),
			ascii: field(display, "ascii", "display", d.ascii, asString, "a string", sink),
			ascii_color: field(display, "ascii_color", "display", d.ascii_color, asString, "a color", sink),
			label_color: field(display, "label_color", "display", d.label_color, asString, "a color", sink),
			glyph: field(display, "glyph", "display", d.glyph, asString, "a string", sink),
			title: normalizeTitle(display.title, "display.title", sink),
			titles: field(display, "titles", "display", d.titles, (v) => normalizeTitles(v, sink), "a table", sink),
		},
		disk: {
			path: field(disk, "path", "disk", defaults.disk.path, asString, "a string", sink),
		},
		default_args: field(root, "default_args", "config", defaults.default_args, asString, "a string", sink),
	};
}

// ── Load / write ──

export async function loadConfig(
	sink: WarningSink,
	path = configPath(),
): Promise<Result<PacfetchConfig, ConfigError>> {
	let raw: string;
	try {
		raw = await readFile(path, "utf-8");
	} catch (e) {
		if (isMissing(e)) return ok(defaultConfig());
		return err({ kind: "parse_error", path, cause: String(e) });
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (e) {
		return err({ kind: "parse_error", path, cause: `Invalid JSON: ${e}` });
	}

	return ok(normalizeConfig(parsed, sink));
}

/** The default config written out, with plain title fields in place of parsed ones. */
export function defaultConfigFile(): unknown {
	const { display, disk, default_args } = defaultConfig();
	const header = { ...defaultTitleSpec(), text: "default", align: undefined };
	return {
		display: { ...display, title: undefined, titles: { header } },
		disk,
		default_args,
	};
}

export async function writeDefaultConfig(path = configPath()): Promise<Result<void, ConfigError>> {
	try {
		await readFile(path, "utf-8");
		return ok(undefined);
	} catch (e) {
		if (!isMissing(e)) return err({ kind: "write_error", path, cause: String(e) });
	}

	try {
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, JSON.stringify(defaultConfigFile(), null, "\t") + "\n", "utf-8");
		return ok(undefined);
	} catch (e) {
		return err({ kind: "write_error", path, cause: String(e) });
	}
}

export function describeConfigError(error: ConfigError): string {
	const verb = error.kind === "parse_error" ? "could not read" : "could not write";
	return `${verb} ${error.path}: ${error.cause}`;
}

// ── CLI arguments ──

export interface CliArgs {
	ascii?: string;
	color?: string;
	stats?: string;
	json: boolean;
	debug: boolean;
	help: boolean;
	version: boolean;
}

export type CliError =
	| { kind: "unknown_flag"; flag: string }
	| { kind: "missing_value"; flag: string };

const VALUE_FLAGS = new Set(["--ascii", "--color", "--stats"]);

export function parseCliArgs(argv: string[]): Result<CliArgs, CliError> {
	const args = argv.slice(2);
	const result: CliArgs = { json: false, debug: false, help: false, version: false };

	for (let i = 0; i < args.length; i++) {
		const flag = args[i] ?? "";

		if (VALUE_FLAGS.has(flag)) {
			const next = args[i + 1];
			if (next === undefined) return err({ kind: "missing_value", flag });
			if (flag === "--ascii") result.ascii = next;
			else if (flag === "--color") result.color = next;
			else result.stats = next;
			i++;
		} else if (flag === "--json") {
			result.json = true;
		} else if (flag === "-d" || flag === "--debug") {
			result.debug = true;
		} else if (flag === "-h" || flag === "--help") {
			result.help = true;
		} else if (flag === "-V" || flag === "-v" || flag === "--version") {
			result.version = true;
		} else {
			return err({ kind: "unknown_flag", flag });
		}
	}

	return ok(result);
}

export function describeCliError(error: CliError): string {
	return error.kind === "unknown_flag"
		? `unrecognized flag '${error.flag}'`
		: `'${error.flag}' needs a value`;
}

const DISPLAY_VALUE_FLAGS = new Set(["--ascii", "--color"]);
const DISPLAY_FLAGS = new Set(["-d", "--debug", "--json"]);

/** Only display flags were passed: no stats source, help or version. */
export function isBareInvocation(argv: string[]): boolean {
	const args = argv.slice(2);
	for (let i = 0; i < args.length; i++) {
		const flag = args[i] ?? "";
		if (DISPLAY_VALUE_FLAGS.has(flag)) i++;
		else if (!DISPLAY_FLAGS.has(flag)) return false;
	}
	return true;
}

/** argv with config.default_args spliced in ahead of any display flags. */
export function withDefaultArgs(argv: string[], config: PacfetchConfig): string[] {
	if (!isBareInvocation(argv)) return argv;
	const extra = config.default_args.split(/\s+/).filter((a) => a.length > 0);
	if (extra.length === 0) return argv;
	return [...argv.slice(0, 2), ...extra, ...argv.slice(2)];
}

export function mergeCliArgs(config: PacfetchConfig, args: CliArgs): PacfetchConfig {
	const display = { ...config.display };

	if (args.ascii !== undefined) display.ascii = args.ascii;
	if (args.color !== undefined) display.ascii_color = args.color;

	return { ...config, display };
}
