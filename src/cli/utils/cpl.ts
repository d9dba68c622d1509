import * as fs from "fs";
import * as path from "path";
import type { Component } from "../../board/Component";
import { normalizeAngle } from "../../board/geometry";
import type { BoardSettings, PlacementOverride } from "../config";

/**
 * Finds the placement override for a package.
 *
 * Priority:
 * 1. Exact package name match (e.g. `SOT-23`)
 * 2. Prefix match, first key in file order (e.g. `SOT` for `SOT-23-5`)
 */
export function resolveOverride(
    packageName: string,
    placement: Record<string, PlacementOverride>
): PlacementOverride {
    if (placement[packageName]) {
        return placement[packageName];
    }
    for (const key of Object.keys(placement)) {
        if (packageName.startsWith(key)) {
            return placement[key];
        }
    }
    return {};
}

// CSV escape helper
const esc = (s: string) =>
    s.includes(",") || s.includes('"') ? `"${s.replace(/"/g, '""')}"` : s;

/**
 * Build a JLCPCB style CPL (pick & place) file.
 *
 * Columns: Designator, Val, Package, Mid X, Mid Y, Rotation, Layer.
 * Positions are converted from board units to mm, overrides from
 * board.yml are added on top.
 */
export function buildCpl(components: Iterable<Component>, settings: BoardSettings): string {
    const csvLines: string[] = [];
    csvLines.push("Designator,Val,Package,Mid X,Mid Y,Rotation,Layer");

    for (const component of components) {
        const pkg = component.getPackage().name;
        const override = resolveOverride(pkg, settings.placement);

        const midX = component.location.x / settings.unitsPerMm + (override.x ?? 0);
        const midY = component.location.y / settings.unitsPerMm + (override.y ?? 0);
        const rotation = normalizeAngle(component.rotation + (override.r ?? 0));
        const layer = component.placedOnFront ? "Top" : "Bottom";

        csvLines.push(
            `${esc(component.name)},,${esc(pkg)},${midX.toFixed(4)}mm,${midY.toFixed(4)}mm,${rotation.toFixed(1)},${layer}`
        );
    }

    return csvLines.join("\n");
}

export function writeCpl(components: Iterable<Component>, settings: BoardSettings, outputPath: string): string {
    const dir = path.dirname(outputPath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(outputPath, buildCpl(components, settings), "utf-8");
    return outputPath;
}
