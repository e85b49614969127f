/**
 * QuadTree Debug Overlay
 *
 * Draws node outlines and per-node occupant counts onto anything that
 * offers the strokeRect/fillText subset of a 2D canvas context. Callers
 * pick their own stroke and fill styles before drawing.
 */

import type { QuadTree } from './quad-tree';
import type { CollisionActor } from './quad-tree-entry';
import { rectangleCenter } from './shapes';

export interface DebugDrawTarget {
    strokeRect(x: number, y: number, width: number, height: number): void;
    fillText(text: string, x: number, y: number): void;
}

export interface DebugDrawOptions {
    /** Draw counts on internal nodes too (default: leaves only) */
    includeInternalCounts?: boolean;
}

export function drawQuadTree<T extends CollisionActor>(
    root: QuadTree<T>,
    target: DebugDrawTarget,
    options: DebugDrawOptions = {}
): void {
    root.visit((node) => {
        const { x, y, width, height } = node.bounds;
        target.strokeRect(x, y, width, height);

        if (node.isLeaf || options.includeInternalCounts) {
            const center = rectangleCenter(node.bounds);
            target.fillText(String(node.occupantCount), center.x, center.y);
        }
    });
}

/**
 * One line per node, indented by depth. For logging from headless runs.
 */
export function describeQuadTree<T extends CollisionActor>(root: QuadTree<T>): string {
    const lines: string[] = [];
    root.visit((node) => {
        const { x, y, width, height } = node.bounds;
        const kind = node.isLeaf ? 'leaf' : 'node';
        lines.push(`${'  '.repeat(node.depth)}${kind} (${x},${y},${width},${height}) count=${node.occupantCount}`);
    });
    return lines.join('\n');
}
