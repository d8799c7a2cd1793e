// Stat identifiers, in their config spelling
export type StatId =
	| "installed"
	| "upgradable"
	| "last_update"
	| "download_size"
	| "installed_size"
	| "net_upgrade_size"
	| "orphaned_packages"
	| "cache_size"
	| "mirror_url"
	| "mirror_health"
	| "disk";

export const STAT_IDS: readonly StatId[] = [
	"installed",
	"upgradable",
	"last_update",
	"download_size",
	"installed_size",
	"net_upgrade_size",
	"orphaned_packages",
	"cache_size",
	"mirror_url",
	"mirror_health",
	"disk",
];

export const STAT_LABELS: Record<StatId, string> = {
	installed: "Installed",
	upgradable: "Upgradable",
	last_update: "Last System Update",
	download_size: "Download Size",
	installed_size: "Installed Size",
	net_upgrade_size: "Net Upgrade Size",
	orphaned_packages: "Orphaned Packages",
	cache_size: "Package Cache",
	mirror_url: "Mirror URL",
	mirror_health: "Mirror Health",
	disk: "Disk",
};

export function isStatId(value: string): value is StatId {
	return STAT_IDS.some((id) => id === value);
}

// A single formatted stat; value null means the collector had no data
export interface StatEntry {
	id: StatId;
	label: string;
	value: string | null;
}

export interface StatsSnapshot {
	entries: Partial<Record<StatId, StatEntry>>;
	pacman_version: string | null;
}

// Title configuration
export type TitleText =
	| { kind: "default" }
	| { kind: "pacman_version" }
	| { kind: "pacfetch_version" }
	| { kind: "empty" }
	| { kind: "literal"; value: string };

export type TitleStyle = "stacked" | "embedded";

export type TitleWidth = "title" | "content" | { fixed: number };

export type TitleAlign = "left" | "center" | "right";

export interface TitleSpec {
	text: TitleText;
	text_color: string;
	line_color: string;
	style: TitleStyle;
	width: TitleWidth;
	align: TitleAlign | null; // null = style default
	line: string;
	left_cap: string;
	right_cap: string;
}

// Entries of display.stats after parsing
export type Declaration =
	| { kind: "stat"; id: StatId }
	| { kind: "title"; name: string }
	| { kind: "legacy_title" }
	| { kind: "unknown"; error: DeclarationError };

export type DeclarationError =
	| { kind: "empty_title_name"; token: string }
	| { kind: "unknown_stat"; token: string };

// Resolved, order-preserving unit consumed by both layout passes
export type RenderItem =
	| { kind: "stat"; entry: StatEntry }
	| { kind: "title"; spec: TitleSpec; text: string }
	| { kind: "unresolved"; name: string };

// Config
export interface PacfetchConfig {
	display: {
		stats: string[];
		ascii: string;
		ascii_color: string;
		label_color: string;
		glyph: string;
		title: TitleSpec;
		titles: Record<string, TitleSpec>;
	};
	disk: {
		path: string;
	};
	default_args: string;
}

export function defaultTitleSpec(): TitleSpec {
	return {
		text: { kind: "default" },
		text_color: "bright_yellow",
		line_color: "none",
		style: "stacked",
		width: "title",
		align: null,
		line: "-",
		left_cap: "",
		right_cap: "",
	};
}

// Default config factory
export function defaultConfig(): PacfetchConfig {
	return {
		display: {
			stats: [
				"title.header",
				"installed",
				"upgradable",
				"last_update",
				"download_size",
				"installed_size",
				"net_upgrade_size",
				"orphaned_packages",
				"cache_size",
				"disk",
				"mirror_url",
				"mirror_health",
			],
			ascii: "PACMAN_DEFAULT",
			ascii_color: "yellow",
			label_color: "yellow",
			glyph: ": ",
			title: defaultTitleSpec(),
			titles: {
				header: defaultTitleSpec(),
			},
		},
		disk: {
			path: "/",
		},
		default_args: "",
	};
}
