import { ok, err, type Result } from "@f0rbit/corpus";
import { isStatId, type Declaration, type DeclarationError } from "./types";

const TITLE_PREFIX = "title.";

export function parseDeclaration(token: string): Result<Declaration, DeclarationError> {
	const trimmed = token.trim();

	if (trimmed.startsWith(TITLE_PREFIX)) {
		const name = trimmed.slice(TITLE_PREFIX.length);
		if (name.length === 0) return err({ kind: "empty_title_name", token });
		return ok({ kind: "title", name });
	}

	if (trimmed === "title") return ok({ kind: "legacy_title" });
	if (isStatId(trimmed)) return ok({ kind: "stat", id: trimmed });

	return err({ kind: "unknown_stat", token });
}

export function describeDeclarationError(error: DeclarationError): string {
	switch (error.kind) {
		case "empty_title_name":
			return `'${error.token}': title name cannot be empty`;
		case "unknown_stat":
			return `unknown stat '${error.token}'`;
	}
}

/**
 * Parse display.stats once, keeping the declared order. Tokens that fail to
 * parse stay in place as `unknown` so the renderer can report them.
 */
export function parseDeclarations(tokens: readonly string[]): Declaration[] {
	return tokens.map((token): Declaration => {
		const result = parseDeclaration(token);
		return result.ok ? result.value : { kind: "unknown", error: result.error };
	});
}
