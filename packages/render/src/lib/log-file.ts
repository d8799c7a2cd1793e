import { ok, err, type Result } from "@f0rbit/corpus";
import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";

export type LogError = { kind: "append_failed"; path: string; cause: string };

/** Append already-formatted warning entries, one per line. */
export async function appendWarnings(entries: readonly string[], path: string): Promise<Result<void, LogError>> {
	if (entries.length === 0) return ok(undefined);

	try {
		await mkdir(dirname(path), { recursive: true });
		await appendFile(path, entries.map((entry) => `${entry}\n`).join(""), "utf-8");
		return ok(undefined);
	} catch (e) {
		return err({ kind: "append_failed", path, cause: e instanceof Error ? e.message : String(e) });
	}
}

export const describeLogError = (error: LogError): string => `could not write log ${error.path}: ${error.cause}`;
