import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Chalk } from "chalk";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runPacfetch, USAGE, type CliIo } from "../cli";

const ARGV0 = ["node", "pacfetch"];
const SWATCHES = " ".repeat(24);
const STAMP = "[2025-01-15 09:05:03] WARN: ";

interface Captured extends CliIo {
	stdout: string[];
	stderr: string[];
}

function capture(home: string): Captured {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		out: (line) => stdout.push(line),
		error: (line) => stderr.push(line),
		home,
		chalk: new Chalk({ level: 0 }),
		clock: () => new Date(2025, 0, 15, 9, 5, 3),
	};
}

describe("runPacfetch", () => {
	let home: string;

	const configFile = () => join(home, ".config", "pacfetch", "config.json");
	const logFile = () => join(home, ".cache", "pacfetch", "pacfetch.log");

	async function writeConfig(config: unknown): Promise<void> {
		await mkdir(join(home, ".config", "pacfetch"), { recursive: true });
		await writeFile(configFile(), JSON.stringify(config));
	}

	beforeEach(async () => {
		home = await mkdtemp(join(tmpdir(), "pacfetch-home-"));
	});

	afterEach(async () => {
		await rm(home, { recursive: true, force: true });
	});

	test("first run writes the default config", async () => {
		const io = capture(home);
		expect(await runPacfetch([...ARGV0, "--json"], io)).toBe(0);

		const written: unknown = JSON.parse(await readFile(configFile(), "utf-8"));
		expect(written).toMatchObject({ display: { ascii: "PACMAN_DEFAULT" }, disk: { path: "/" } });
	});

	test("--json prints the sample stats", async () => {
		const io = capture(home);
		await runPacfetch([...ARGV0, "--json"], io);

		expect(io.stdout).toHaveLength(1);
		expect(JSON.parse(io.stdout[0] ?? "")).toEqual({
			installed: "123",
			upgradable: "45",
			last_update: "7 days 0 hours",
			mirror_health: "Err - no mirror found",
		});
		expect(io.stderr).toEqual([]);
	});

	test("the block without art", async () => {
		await writeConfig({ display: { stats: ["installed", "upgradable"], ascii: "NONE" } });
		const io = capture(home);

		expect(await runPacfetch(ARGV0, io)).toBe(0);
		expect(io.stdout).toEqual(["", "Installed: 123", "Upgradable: 45", "", SWATCHES, SWATCHES, ""]);
	});

	test("a title and its rule", async () => {
		await writeConfig({
			display: {
				stats: ["title.header", "installed"],
				ascii: "NONE",
				titles: { header: { text: "pkgs", line: "=" } },
			},
		});
		const io = capture(home);

		await runPacfetch([...ARGV0, "--debug"], io);
		expect(io.stdout).toEqual(["pkgs", "====", "Installed: 123"]);
	});

	test("--ascii overrides the configured art", async () => {
		await writeConfig({ display: { stats: ["installed"], ascii: "NONE" } });
		const io = capture(home);

		await runPacfetch([...ARGV0, "--ascii", "<>\n><"], io);
		expect(io.stdout).toEqual(["", ` <>   Installed: 123`, ` ><   `, `      ${SWATCHES}`, `      ${SWATCHES}`, ""]);
	});

	test("debug echoes warnings and logs them", async () => {
		await writeConfig({ display: { stats: ["installed", "title.missing"] } });
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "--debug"], io)).toBe(0);
		expect(io.stdout).toEqual(["Installed: 123"]);

		const entry = `${STAMP}title 'missing' is not defined in display.titles, skipping`;
		expect(io.stderr).toEqual([entry]);
		expect(await readFile(logFile(), "utf-8")).toBe(`${entry}\n`);
	});

	test("without debug warnings only reach the log", async () => {
		await writeConfig({ display: { stats: ["installed", "bogus"], ascii: "NONE" } });
		const io = capture(home);

		await runPacfetch(ARGV0, io);
		expect(io.stderr).toEqual([]);
		expect(await readFile(logFile(), "utf-8")).toBe(`${STAMP}unknown stat 'bogus', skipping\n`);
	});

	test("default args apply to a bare invocation", async () => {
		await writeConfig({ default_args: "--version" });
		const io = capture(home);

		await runPacfetch(ARGV0, io);
		expect(io.stdout).toEqual(["pacfetch 0.4.0"]);
	});

	test("display flags still take the default args", async () => {
		await writeConfig({ default_args: "--json" });
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "-d"], io)).toBe(0);
		expect(io.stdout).toHaveLength(1);
		expect(JSON.parse(io.stdout[0] ?? "")).toMatchObject({ installed: "123", upgradable: "45" });
	});

	test("a config directory that cannot be created is only logged", async () => {
		await writeFile(join(home, ".config"), "");
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "--json"], io)).toBe(0);
		expect(io.stderr).toEqual([]);
		expect(io.stdout).toHaveLength(1);
		const log = await readFile(logFile(), "utf-8");
		expect(log.startsWith(`${STAMP}could not write ${configFile()}: `)).toBe(true);
		expect(log.split("\n")).toHaveLength(2);
	});

	test("broken default args are ignored with a warning", async () => {
		await writeConfig({ default_args: "--bogus", display: { stats: ["installed"], ascii: "NONE" } });
		const io = capture(home);

		expect(await runPacfetch(ARGV0, io)).toBe(0);
		expect(io.stdout[1]).toBe("Installed: 123");
		expect(await readFile(logFile(), "utf-8")).toBe(
			`${STAMP}config: default_args unrecognized flag '--bogus', ignoring them\n`,
		);
	});

	test("an unknown flag exits 2 with usage", async () => {
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "--nope"], io)).toBe(2);
		expect(io.stderr).toEqual(["pacfetch: unrecognized flag '--nope'", USAGE]);
		expect(io.stdout).toEqual([]);
	});

	test("--help prints usage", async () => {
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "-h"], io)).toBe(0);
		expect(io.stdout).toEqual([USAGE]);
	});

	test("a broken config file falls back to defaults", async () => {
		await mkdir(join(home, ".config", "pacfetch"), { recursive: true });
		await writeFile(configFile(), "{ nope");
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "--json"], io)).toBe(0);
		expect(io.stderr).toHaveLength(1);
		expect(io.stderr[0]?.startsWith(`pacfetch: could not read ${configFile()}: Invalid JSON: `)).toBe(true);
		expect(io.stderr[0]?.endsWith(", using the defaults")).toBe(true);
		expect(io.stdout).toHaveLength(1);
	});

	test("--stats reads a stats file relative to home", async () => {
		await writeFile(join(home, "stats.json"), JSON.stringify({ total_installed: 5, total_upgradable: 1 }));
		const io = capture(home);

		await runPacfetch([...ARGV0, "--stats", "~/stats.json", "--json"], io);
		expect(JSON.parse(io.stdout[0] ?? "")).toMatchObject({ installed: "5", upgradable: "1" });
	});

	test("an unreadable stats file exits 1", async () => {
		const io = capture(home);

		expect(await runPacfetch([...ARGV0, "--stats", "/nonexistent/stats.json"], io)).toBe(1);
		expect(io.stderr[0]?.startsWith("pacfetch: could not read stats file /nonexistent/stats.json: ")).toBe(true);
		expect(io.stdout).toEqual([]);
	});
});
