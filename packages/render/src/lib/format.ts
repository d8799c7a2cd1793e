const BYTES_PER_GIB = 1024 ** 3;

const plural = (n: number, unit: string): string => `${n} ${unit}${n === 1 ? "" : "s"}`;

export function formatDuration(seconds: number): string {
	if (seconds < 60) return plural(seconds, "second");
	if (seconds < 3600) return plural(Math.floor(seconds / 60), "minute");
	if (seconds < 86400) return plural(Math.floor(seconds / 3600), "hour");

	const days = Math.floor(seconds / 86400);
	const hours = Math.floor((seconds % 86400) / 3600);
	return `${plural(days, "day")} ${plural(hours, "hour")}`;
}

export function formatMib(mib: number): string {
	return `${mib.toFixed(2)} MiB`;
}

export function formatGib(bytes: number): string {
	return `${(bytes / BYTES_PER_GIB).toFixed(2)} GiB`;
}

export function usagePercent(used: number, total: number): number {
	return total > 0 ? (used * 100) / total : 0;
}
