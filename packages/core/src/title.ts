import type { TitleText } from "./types";

export function appTitle(app_version: string): string {
	return `pacfetch ${app_version}`;
}

/** Short pacman version: everything before the libalpm suffix. */
export function shortPacmanVersion(full: string): string {
	const dash = full.indexOf(" - ");
	return dash === -1 ? full : full.slice(0, dash).trim();
}

export function resolveTitleText(
	text: TitleText,
	pacman_version: string | null,
	app_version: string,
): string {
	switch (text.kind) {
		case "empty":
			return "";
		case "default":
			return pacman_version ?? appTitle(app_version);
		case "pacman_version":
			return pacman_version === null ? "Pacman" : shortPacmanVersion(pacman_version);
		case "pacfetch_version":
			return appTitle(app_version);
		case "literal":
			return text.value;
	}
}

// Config spelling of a title template
export function parseTitleText(raw: string): TitleText {
	switch (raw) {
		case "":
			return { kind: "empty" };
		case "default":
			return { kind: "default" };
		case "pacman_ver":
			return { kind: "pacman_version" };
		case "pacfetch_ver":
			return { kind: "pacfetch_version" };
		default:
			return { kind: "literal", value: raw };
	}
}
