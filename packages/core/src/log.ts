/**
 * Warning sink — the only channel the renderer uses to report degraded output.
 *
 * Entries are timestamped at the moment they are recorded. The CLI decides
 * where they end up (log file, stderr); tests read them from memory.
 */
export interface WarningSink {
	warn(message: string): void;
}

export interface MemorySink extends WarningSink {
	readonly messages: readonly string[];
	readonly entries: readonly string[];
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

export function formatTimestamp(date: Date): string {
	const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
	const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
	return `${day} ${time}`;
}

export function formatWarning(message: string, at: Date): string {
	return `[${formatTimestamp(at)}] WARN: ${message}`;
}

export function createMemorySink(clock: () => Date = () => new Date()): MemorySink {
	const messages: string[] = [];
	const entries: string[] = [];

	return {
		warn(message: string) {
			messages.push(message);
			entries.push(formatWarning(message, clock()));
		},
		get messages() { return messages; },
		get entries() { return entries; },
	};
}
