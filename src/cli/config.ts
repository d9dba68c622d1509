import * as path from "path";
import * as fs from "fs";
import * as yaml from "js-yaml";

export interface Config {
    projectRoot: string;
    settingsPath: string;
}

/** Offsets applied to one package in the placement export (mm / degrees) */
export interface PlacementOverride {
    x?: number;
    y?: number;
    r?: number;
}

export interface BoardSettings {
    /** Back side components are rotated before mirroring */
    flipStyleRotateFirst: boolean;
    /** Board units per millimetre */
    unitsPerMm: number;
    /** Keyed by package name, or a package name prefix */
    placement: Record<string, PlacementOverride>;
}

export const SETTINGS_FILE = "board.yml";

export const DEFAULT_SETTINGS: BoardSettings = {
    flipStyleRotateFirst: false,
    unitsPerMm: 10000,
    placement: {},
};

let configCache: Config | null = null;

export function getConfig(): Config {
    if (configCache) return configCache;

    const cwd = process.env.INIT_CWD || process.cwd();
    let projectRoot = cwd;

    // --root on the command line ends up here
    if (process.env.BOARD_ROOT) {
        projectRoot = path.resolve(cwd, process.env.BOARD_ROOT);
    }

    configCache = {
        projectRoot,
        settingsPath: path.join(projectRoot, SETTINGS_FILE),
    };

    return configCache;
}

/** Forget the cached config, so the next getConfig() reads the environment again */
export function resetConfig(): void {
    configCache = null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown, field: string): number | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`${field} must be a number`);
    }
    return value;
}

/**
 * Validate the parsed contents of board.yml. Missing keys take their
 * defaults; keys of the wrong type throw.
 */
export function parseSettings(raw: unknown): BoardSettings {
    if (raw === undefined || raw === null) {
        return { ...DEFAULT_SETTINGS, placement: {} };
    }
    if (!isRecord(raw)) {
        throw new Error("expected a mapping at the top level");
    }

    const settings: BoardSettings = { ...DEFAULT_SETTINGS, placement: {} };

    const flipStyle = raw.flipStyleRotateFirst;
    if (flipStyle !== undefined) {
        if (typeof flipStyle !== "boolean") {
            throw new Error("flipStyleRotateFirst must be true or false");
        }
        settings.flipStyleRotateFirst = flipStyle;
    }

    const unitsPerMm = optionalNumber(raw.unitsPerMm, "unitsPerMm");
    if (unitsPerMm !== undefined) {
        if (unitsPerMm <= 0) {
            throw new Error("unitsPerMm must be positive");
        }
        settings.unitsPerMm = unitsPerMm;
    }

    const placement = raw.placement;
    if (placement !== undefined && placement !== null) {
        if (!isRecord(placement)) {
            throw new Error("placement must be a mapping of package names");
        }
        for (const [key, entry] of Object.entries(placement)) {
            if (!isRecord(entry)) {
                throw new Error(`placement.${key} must be a mapping`);
            }
            settings.placement[key] = {
                x: optionalNumber(entry.x, `placement.${key}.x`),
                y: optionalNumber(entry.y, `placement.${key}.y`),
                r: optionalNumber(entry.r, `placement.${key}.r`),
            };
        }
    }

    return settings;
}

/**
 * Loads board.yml from the project root.
 * A missing or broken file leaves the defaults in place.
 */
export function loadSettings(projectRoot: string): BoardSettings {
    const settingsPath = path.join(projectRoot, SETTINGS_FILE);
    if (!fs.existsSync(settingsPath)) {
        return { ...DEFAULT_SETTINGS, placement: {} };
    }
    try {
        const content = fs.readFileSync(settingsPath, "utf-8");
        return parseSettings(yaml.load(content));
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        console.warn(`⚠️  Failed to parse ${SETTINGS_FILE}: ${reason}`);
        return { ...DEFAULT_SETTINGS, placement: {} };
    }
}
