import { ok, type Result } from "@f0rbit/corpus";
import {
	composeBlock,
	composePlain,
	createMemorySink,
	defaultConfig,
	parseDeclarations,
	render,
	resolveColor,
	type MemorySink,
	type PacfetchConfig,
} from "@pacfetch/core";
import type { ChalkInstance } from "chalk";
import {
	APP_VERSION,
	configPath,
	describeCliError,
	describeConfigError,
	expandTilde,
	loadConfig,
	logPath,
	mergeCliArgs,
	parseCliArgs,
	withDefaultArgs,
	writeDefaultConfig,
	type CliArgs,
	type CliError,
} from "./config";
import { loadArt } from "./lib/ascii";
import { appendWarnings, describeLogError } from "./lib/log-file";
import {
	buildSnapshot,
	describeStatsFileError,
	loadStatsFile,
	sampleStats,
	statsToJson,
	type PackageStats,
	type StatsFileError,
} from "./lib/stats";

export const USAGE = `Usage: pacfetch [options]

Options:
  --ascii <art>     art name, file path or NONE
  --color <color>   art color (name or #RRGGBB)
  --stats <file>    read package stats from a JSON file
  --json            print stats as JSON
  -d, --debug       plain output, warnings echoed to stderr
  -h, --help        show this help
  -V, --version     show the version`;

export interface CliIo {
	out: (line: string) => void;
	error: (line: string) => void;
	home: string;
	chalk: ChalkInstance;
	clock?: () => Date;
}

// ── Steps ──

async function readConfig(io: CliIo, sink: MemorySink): Promise<PacfetchConfig> {
	const path = configPath(io.home);

	const written = await writeDefaultConfig(path);
	if (!written.ok) sink.warn(describeConfigError(written.error));

	const loaded = await loadConfig(sink, path);
	if (loaded.ok) return loaded.value;

	io.error(`pacfetch: ${describeConfigError(loaded.error)}, using the defaults`);
	return defaultConfig();
}

/** Bad `default_args` are dropped with a warning; bad command-line flags are fatal. */
function readArgs(argv: string[], config: PacfetchConfig, sink: MemorySink): Result<CliArgs, CliError> {
	const spliced = withDefaultArgs(argv, config);
	const parsed = parseCliArgs(spliced);
	if (parsed.ok || spliced === argv) return parsed;

	sink.warn(`config: default_args ${describeCliError(parsed.error)}, ignoring them`);
	return parseCliArgs(argv);
}

function readStats(args: CliArgs, io: CliIo): Promise<Result<PackageStats, StatsFileError>> {
	if (args.stats === undefined) return Promise.resolve(ok(sampleStats()));
	return loadStatsFile(expandTilde(args.stats, io.home));
}

async function flushWarnings(sink: MemorySink, io: CliIo, echo: boolean): Promise<void> {
	if (echo) {
		for (const entry of sink.entries) io.error(entry);
	}
	const appended = await appendWarnings(sink.entries, logPath(io.home));
	if (!appended.ok) io.error(`pacfetch: ${describeLogError(appended.error)}`);
}

async function renderOutput(
	config: PacfetchConfig,
	stats: PackageStats,
	debug: boolean,
	io: CliIo,
	sink: MemorySink,
): Promise<string[]> {
	const lines = render(parseDeclarations(config.display.stats), buildSnapshot(stats, config.disk.path, io.chalk), {
		glyph: config.display.glyph,
		label_color: config.display.label_color,
		titles: config.display.titles,
		legacy_title: config.display.title,
		app_version: APP_VERSION,
		chalk: io.chalk,
		sink,
	});

	if (debug) return composePlain(lines);

	const art = await loadArt(config.display.ascii, sink, io.home);
	const art_color = resolveColor(config.display.ascii_color, sink, "display.ascii_color");
	return composeBlock(lines, art, { art_color, chalk: io.chalk });
}

// ── Entry ──

/** Runs one invocation and returns the process exit code. */
export async function runPacfetch(argv: string[], io: CliIo): Promise<number> {
	const sink = createMemorySink(io.clock);
	const loaded = await readConfig(io, sink);

	const args = readArgs(argv, loaded, sink);
	if (!args.ok) {
		io.error(`pacfetch: ${describeCliError(args.error)}`);
		io.error(USAGE);
		await flushWarnings(sink, io, false);
		return 2;
	}

	const { debug } = args.value;

	if (args.value.help) {
		io.out(USAGE);
		await flushWarnings(sink, io, debug);
		return 0;
	}
	if (args.value.version) {
		io.out(`pacfetch ${APP_VERSION}`);
		await flushWarnings(sink, io, debug);
		return 0;
	}

	const config = mergeCliArgs(loaded, args.value);
	const stats = await readStats(args.value, io);
	if (!stats.ok) {
		io.error(`pacfetch: ${describeStatsFileError(stats.error)}`);
		await flushWarnings(sink, io, debug);
		return 1;
	}

	if (args.value.json) {
		io.out(JSON.stringify(statsToJson(stats.value), null, 2));
	} else {
		for (const line of await renderOutput(config, stats.value, debug, io, sink)) io.out(line);
	}

	await flushWarnings(sink, io, debug);
	return 0;
}
