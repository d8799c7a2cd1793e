import { ok, err, type Result } from "@f0rbit/corpus";
import { STAT_IDS, STAT_LABELS, type StatEntry, type StatId, type StatsSnapshot } from "@pacfetch/core";
import { Chalk, type ChalkInstance } from "chalk";
import { readFile } from "node:fs/promises";
import { formatDuration, formatGib, formatMib, usagePercent } from "./format";

// Raw numbers as a package-manager collector reports them
export interface PackageStats {
	total_installed: number;
	total_upgradable: number;
	seconds_since_last_update: number | null;
	download_size_mb: number | null;
	total_installed_size_mb: number | null;
	net_upgrade_size_mb: number | null;
	orphaned_packages: number | null;
	orphaned_size_mb: number | null;
	cache_size_mb: number | null;
	mirror_url: string | null;
	mirror_sync_age_hours: number | null;
	pacman_version: string | null;
	disk_used_bytes: number | null;
	disk_total_bytes: number | null;
}

export type StatsFileError =
	| { kind: "read_failed"; path: string; cause: string }
	| { kind: "invalid_json"; path: string; cause: string };

export function emptyStats(): PackageStats {
	return {
		total_installed: 0,
		total_upgradable: 0,
		seconds_since_last_update: null,
		download_size_mb: null,
		total_installed_size_mb: null,
		net_upgrade_size_mb: null,
		orphaned_packages: null,
		orphaned_size_mb: null,
		cache_size_mb: null,
		mirror_url: null,
		mirror_sync_age_hours: null,
		pacman_version: null,
		disk_used_bytes: null,
		disk_total_bytes: null,
	};
}

/** Fixed demonstration values, used when no stats file is given. */
export function sampleStats(): PackageStats {
	return {
		...emptyStats(),
		total_installed: 123,
		total_upgradable: 45,
		seconds_since_last_update: 7 * 86400,
	};
}

// ── Formatting ──

const mib = (value: number | null): string | null => (value === null ? null : formatMib(value));

function formatOrphans(stats: PackageStats): string | null {
	const count = stats.orphaned_packages;
	if (count === null) return null;
	if (count === 0) return "0";
	return stats.orphaned_size_mb === null ? String(count) : `${count} (${formatMib(stats.orphaned_size_mb)})`;
}

function formatMirrorHealth(stats: PackageStats, chalk: ChalkInstance): string {
	if (stats.mirror_url === null) return `${chalk.red("Err")} - no mirror found`;
	if (stats.mirror_sync_age_hours === null) return `${chalk.red("Err")} - could not check sync status`;
	return `${chalk.green("OK")} (last sync ${stats.mirror_sync_age_hours.toFixed(1)} hours)`;
}

function formatDisk(stats: PackageStats, chalk: ChalkInstance): string | null {
	const { disk_used_bytes: used, disk_total_bytes: total } = stats;
	if (used === null || total === null) return null;

	const pct = usagePercent(used, total);
	const label = `(${pct.toFixed(0)}%)`;
	const colored = pct > 90 ? chalk.red(label) : pct >= 70 ? chalk.yellow(label) : chalk.green(label);
	return `${formatGib(used)} / ${formatGib(total)} ${colored}`;
}

export function formatStatValue(id: StatId, stats: PackageStats, chalk: ChalkInstance): string | null {
	switch (id) {
		case "installed":
			return String(stats.total_installed);
		case "upgradable":
			return String(stats.total_upgradable);
		case "last_update":
			return stats.seconds_since_last_update === null ? null : formatDuration(stats.seconds_since_last_update);
		case "download_size":
			return mib(stats.download_size_mb);
		case "installed_size":
			return mib(stats.total_installed_size_mb);
		case "net_upgrade_size":
			return mib(stats.net_upgrade_size_mb);
		case "orphaned_packages":
			return formatOrphans(stats);
		case "cache_size":
			return mib(stats.cache_size_mb);
		case "mirror_url":
			return stats.mirror_url;
		case "mirror_health":
			return formatMirrorHealth(stats, chalk);
		case "disk":
			return formatDisk(stats, chalk);
	}
}

export function statLabel(id: StatId, disk_path: string): string {
	return id === "disk" ? `${STAT_LABELS.disk} (${disk_path})` : STAT_LABELS[id];
}

export function buildSnapshot(stats: PackageStats, disk_path: string, chalk: ChalkInstance): StatsSnapshot {
	const entries: Partial<Record<StatId, StatEntry>> = {};
	for (const id of STAT_IDS) {
		entries[id] = { id, label: statLabel(id, disk_path), value: formatStatValue(id, stats, chalk) };
	}
	return { entries, pacman_version: stats.pacman_version };
}

const uncolored = new Chalk({ level: 0 });

/** `--json` output: every available value, keyed by its config name. */
export function statsToJson(stats: PackageStats): Record<string, string> {
	const out: Record<string, string> = {};
	for (const id of STAT_IDS) {
		const value = formatStatValue(id, stats, uncolored);
		if (value !== null) out[id] = value;
	}
	return out;
}

// ── Stats file ──

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const numberOr = <T>(value: unknown, fallback: T): number | T =>
	typeof value === "number" && Number.isFinite(value) ? value : fallback;

const wholeOrNull = (value: unknown): number | null => {
	const n = numberOr(value, null);
	return n === null ? null : Math.floor(n);
};

const stringOrNull = (value: unknown): string | null => (typeof value === "string" ? value : null);

/** Fields that are missing or of the wrong type read as "no data". */
export function parseStats(raw: unknown): PackageStats {
	const r = isRecord(raw) ? raw : {};
	return {
		total_installed: numberOr(r.total_installed, 0),
		total_upgradable: numberOr(r.total_upgradable, 0),
		seconds_since_last_update: wholeOrNull(r.seconds_since_last_update),
		download_size_mb: numberOr(r.download_size_mb, null),
		total_installed_size_mb: numberOr(r.total_installed_size_mb, null),
		net_upgrade_size_mb: numberOr(r.net_upgrade_size_mb, null),
		orphaned_packages: numberOr(r.orphaned_packages, null),
		orphaned_size_mb: numberOr(r.orphaned_size_mb, null),
		cache_size_mb: numberOr(r.cache_size_mb, null),
		mirror_url: stringOrNull(r.mirror_url),
		mirror_sync_age_hours: numberOr(r.mirror_sync_age_hours, null),
		pacman_version: stringOrNull(r.pacman_version),
		disk_used_bytes: numberOr(r.disk_used_bytes, null),
		disk_total_bytes: numberOr(r.disk_total_bytes, null),
	};
}

export async function loadStatsFile(path: string): Promise<Result<PackageStats, StatsFileError>> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (e) {
		return err({ kind: "read_failed", path, cause: e instanceof Error ? e.message : String(e) });
	}

	try {
		return ok(parseStats(JSON.parse(text)));
	} catch (e) {
		return err({ kind: "invalid_json", path, cause: e instanceof Error ? e.message : String(e) });
	}
}

export function describeStatsFileError(error: StatsFileError): string {
	return error.kind === "read_failed"
		? `could not read stats file ${error.path}: ${error.cause}`
		: `stats file ${error.path} is not valid JSON: ${error.cause}`;
}
