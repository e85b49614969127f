/**
 * QuadTree for Broad Phase Overlap Queries
 *
 * Recursively subdivides a fixed world rectangle as leaves fill up.
 * An entry that straddles quadrant edges is held by every leaf it overlaps;
 * count, merge and query passes use the entry's dirty flag so such an
 * entry is still seen only once per pass.
 *
 * Per tick the owner removes every moved entry from all of its parents,
 * refreshes its bounds and inserts it again from the root, then calls
 * shake() on the root to collapse subtrees that emptied out.
 */

import { QuadTreeEntry, CollisionActor } from './quad-tree-entry';
import { RectangleF, ShapeF, rectangleQuadrants, shapesIntersect } from './shapes';
import { QuadTreeError } from './errors';
import { canDetect } from './layers';

// ============================================
// Configuration
// ============================================

export const DEFAULT_MAX_DEPTH = 7;
export const DEFAULT_MAX_OBJECTS_PER_NODE = 25;

export interface QuadTreeOptions {
    /** Nodes at depth maxDepth - 1 never split (root is depth 0) */
    maxDepth?: number;
    /** Leaf occupancy at which the next insert splits the leaf */
    maxObjectsPerNode?: number;
}

// Log split and shake transitions
let quadTreeDebugEnabled = false;

export function enableQuadTreeDebug(enabled: boolean): void {
    quadTreeDebugEnabled = enabled;
}

// ============================================
// Node State
// ============================================

export type QuadTreeChildren<T extends CollisionActor> =
    readonly [QuadTree<T>, QuadTree<T>, QuadTree<T>, QuadTree<T>];

type NodeState<T extends CollisionActor> =
    | { kind: 'leaf'; contents: Set<QuadTreeEntry<T>> }
    | { kind: 'internal'; children: QuadTreeChildren<T> };

/** What the debug visit reports for each node */
export interface QuadTreeNodeInfo {
    bounds: Readonly<RectangleF>;
    depth: number;
    isLeaf: boolean;
    /** Unique entries at or below this node */
    occupantCount: number;
}

export interface QuadTreeStats {
    nodeCount: number;
    maxDepth: number;
    entryCount: number;
}

function formatRect(rect: RectangleF): string {
    return `(${rect.x},${rect.y},${rect.width},${rect.height})`;
}

// ============================================
// QuadTree Node
// ============================================

export class QuadTree<T extends CollisionActor = CollisionActor> {
    readonly bounds: Readonly<RectangleF>;
    readonly depth: number;
    readonly maxDepth: number;
    readonly maxObjectsPerNode: number;

    private state: NodeState<T> = { kind: 'leaf', contents: new Set() };

    // OR of the layer bits of the current contents; 0 while internal
    private _layerMask = 0;

    constructor(bounds: RectangleF, options: QuadTreeOptions = {}, depth: number = 0) {
        const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
        const maxObjectsPerNode = options.maxObjectsPerNode ?? DEFAULT_MAX_OBJECTS_PER_NODE;

        if (!Number.isInteger(maxDepth) || maxDepth < 1) {
            throw new QuadTreeError('INVALID_OPTIONS', `maxDepth must be a positive integer, got ${maxDepth}`);
        }
        if (!Number.isInteger(maxObjectsPerNode) || maxObjectsPerNode < 1) {
            throw new QuadTreeError('INVALID_OPTIONS', `maxObjectsPerNode must be a positive integer, got ${maxObjectsPerNode}`);
        }
        if (!(bounds.width > 0 && bounds.height > 0)) {
            throw new QuadTreeError('INVALID_OPTIONS', `bounds must have a positive size, got ${formatRect(bounds)}`);
        }

        this.bounds = { ...bounds };
        this.depth = depth;
        this.maxDepth = maxDepth;
        this.maxObjectsPerNode = maxObjectsPerNode;
    }

    get isLeaf(): boolean {
        return this.state.kind === 'leaf';
    }

    /** Four children (top-left, top-right, bottom-right, bottom-left) or none */
    get children(): readonly QuadTree<T>[] {
        return this.state.kind === 'internal' ? this.state.children : [];
    }

    /** Entries held directly; always empty on an internal node */
    get contents(): ReadonlySet<QuadTreeEntry<T>> {
        return this.state.kind === 'leaf' ? this.state.contents : new Set();
    }

    get layerMask(): number {
        return this._layerMask;
    }

    // ============================================
    // Insertion
    // ============================================

    /**
     * Insert an entry into every leaf its bounds overlap.
     * Entries outside this node are ignored.
     */
    insert(entry: QuadTreeEntry<T>): void {
        if (!shapesIntersect(this.bounds, entry.bounds)) {
            return;
        }

        if (this.state.kind === 'leaf' && this.state.contents.size >= this.maxObjectsPerNode) {
            this.split();
        }

        const state = this.state;
        if (state.kind === 'leaf') {
            this.addToLeaf(state.contents, entry);
        } else {
            for (const child of state.children) {
                child.insert(entry);
            }
        }
    }

    private addToLeaf(contents: Set<QuadTreeEntry<T>>, entry: QuadTreeEntry<T>): void {
        entry.addParent(this);
        contents.add(entry);
        this._layerMask |= entry.layer;
    }

    /**
     * Subdivide into four quadrants and push the contents down.
     * Does nothing on an internal node or once the depth cap is reached;
     * a leaf at the cap keeps growing past maxObjectsPerNode.
     */
    split(): void {
        if (this.state.kind === 'internal' || this.depth + 1 >= this.maxDepth) {
            return;
        }

        const contents = this.state.contents;
        const [topLeft, topRight, bottomRight, bottomLeft] = rectangleQuadrants(this.bounds);
        const children: QuadTreeChildren<T> = [
            this.createChild(topLeft),
            this.createChild(topRight),
            this.createChild(bottomRight),
            this.createChild(bottomLeft),
        ];

        this.state = { kind: 'internal', children };
        this._layerMask = 0;

        for (const entry of contents) {
            entry.removeParent(this);
            for (const child of children) {
                child.insert(entry);
            }
        }

        if (quadTreeDebugEnabled) {
            console.log(`[QuadTree] Split depth=${this.depth} bounds=${formatRect(this.bounds)} migrated=${contents.size}`);
        }
    }

    private createChild(bounds: RectangleF): QuadTree<T> {
        return new QuadTree<T>(
            bounds,
            { maxDepth: this.maxDepth, maxObjectsPerNode: this.maxObjectsPerNode },
            this.depth + 1
        );
    }

    // ============================================
    // Removal
    // ============================================

    /**
     * Remove an entry from this leaf.
     * Throws on an internal node: the caller holds a stale parent reference.
     */
    remove(entry: QuadTreeEntry<T>): void {
        if (this.state.kind !== 'leaf') {
            throw new QuadTreeError(
                'REMOVE_FROM_INTERNAL',
                `Cannot remove from a non-leaf node at depth ${this.depth} ${formatRect(this.bounds)}`
            );
        }

        this.state.contents.delete(entry);
        entry.removeParent(this);
        this.updateLayerMask();
    }

    private updateLayerMask(): void {
        this._layerMask = 0;
        if (this.state.kind !== 'leaf') return;
        for (const entry of this.state.contents) {
            this._layerMask |= entry.layer;
        }
    }

    /**
     * Collapse subtrees that no longer need their children.
     * Empty subtrees become empty leaves, under-populated ones pull their
     * unique entries up into this node, full ones are shaken recursively.
     */
    shake(): void {
        const state = this.state;
        if (state.kind === 'leaf') {
            return;
        }

        const numObjects = this.numTargets();

        if (numObjects === 0) {
            this.state = { kind: 'leaf', contents: new Set() };
            this._layerMask = 0;
            if (quadTreeDebugEnabled) {
                console.log(`[QuadTree] Shake depth=${this.depth} bounds=${formatRect(this.bounds)} emptied`);
            }
        } else if (numObjects < this.maxObjectsPerNode) {
            const dirtyItems: QuadTreeEntry<T>[] = [];
            this.forEachLeaf((leaf, contents) => {
                for (const entry of contents) {
                    entry.removeParent(leaf);
                    if (!entry.dirty) {
                        entry.markDirty();
                        dirtyItems.push(entry);
                    }
                }
            });

            const contents = new Set<QuadTreeEntry<T>>();
            this.state = { kind: 'leaf', contents };
            this._layerMask = 0;
            for (const entry of dirtyItems) {
                entry.markClean();
                this.addToLeaf(contents, entry);
            }

            if (quadTreeDebugEnabled) {
                console.log(`[QuadTree] Shake depth=${this.depth} bounds=${formatRect(this.bounds)} merged=${dirtyItems.length}`);
            }
        } else {
            for (const child of state.children) {
                child.shake();
            }
        }
    }

    // ============================================
    // Traversal
    // ============================================

    /**
     * Breadth-first walk calling back once per leaf.
     */
    private forEachLeaf(callback: (leaf: QuadTree<T>, contents: Set<QuadTreeEntry<T>>) => void): void {
        const process: QuadTree<T>[] = [this];
        for (let i = 0; i < process.length; i++) {
            const node = process[i];
            const state = node.state;
            if (state.kind === 'internal') {
                process.push(...state.children);
            } else {
                callback(node, state.contents);
            }
        }
    }

    /**
     * Count unique entries in this subtree.
     * Every dirty flag set during the count is cleared before returning.
     */
    numTargets(): number {
        const dirtyItems: QuadTreeEntry<T>[] = [];

        this.forEachLeaf((_leaf, contents) => {
            for (const entry of contents) {
                if (!entry.dirty) {
                    entry.markDirty();
                    dirtyItems.push(entry);
                }
            }
        });

        for (const entry of dirtyItems) {
            entry.markClean();
        }
        return dirtyItems.length;
    }

    /**
     * Collect entries overlapping an area, or the entries a querying entry
     * may detect, into `result`.
     *
     * Reported entries are left dirty so that later leaves holding the same
     * entry skip it. Clear them (or use query()) before the next independent
     * pass.
     *
     * Querying with an entry also filters by its mask: whole leaves whose
     * layer mask shares no bit with it are skipped. The querying entry itself
     * is reported when its own layer is in its mask.
     */
    queryWithoutReset(target: ShapeF | QuadTreeEntry<T>, result: QuadTreeEntry<T>[]): void {
        if (target instanceof QuadTreeEntry) {
            this.queryEntry(target, result);
        } else {
            this.queryArea(target, result);
        }
    }

    /**
     * Same as queryWithoutReset(), returning a fresh list and cleaning
     * the dirty flags of everything reported.
     */
    query(target: ShapeF | QuadTreeEntry<T>): QuadTreeEntry<T>[] {
        const result: QuadTreeEntry<T>[] = [];
        this.queryWithoutReset(target, result);
        for (const entry of result) {
            entry.markClean();
        }
        return result;
    }

    private queryArea(area: ShapeF, result: QuadTreeEntry<T>[]): void {
        if (!shapesIntersect(this.bounds, area)) {
            return;
        }

        const state = this.state;
        if (state.kind === 'internal') {
            for (const child of state.children) {
                child.queryArea(area, result);
            }
            return;
        }

        for (const entry of state.contents) {
            if (!entry.dirty && shapesIntersect(entry.bounds, area)) {
                result.push(entry);
                entry.markDirty();
            }
        }
    }

    private queryEntry(querier: QuadTreeEntry<T>, result: QuadTreeEntry<T>[]): void {
        if (querier.mask === 0 || !shapesIntersect(this.bounds, querier.bounds)) {
            return;
        }

        const state = this.state;
        if (state.kind === 'internal') {
            for (const child of state.children) {
                child.queryEntry(querier, result);
            }
            return;
        }

        // Nothing in this leaf is on a layer the querier tests against
        if (!canDetect(querier, { layer: this._layerMask })) {
            return;
        }

        for (const entry of state.contents) {
            if (!entry.dirty &&
                canDetect(querier, entry) &&
                shapesIntersect(entry.bounds, querier.bounds)) {
                result.push(entry);
                entry.markDirty();
            }
        }
    }

    // ============================================
    // Debug
    // ============================================

    /**
     * Read-only pre-order walk for overlays and diagnostics.
     */
    visit(visitor: (node: QuadTreeNodeInfo) => void): void {
        visitor({
            bounds: this.bounds,
            depth: this.depth,
            isLeaf: this.isLeaf,
            occupantCount: this.numTargets(),
        });
        for (const child of this.children) {
            child.visit(visitor);
        }
    }

    getStats(): QuadTreeStats {
        let nodeCount = 0;
        let maxDepth = this.depth;
        const nodes: QuadTree<T>[] = [this];

        while (nodes.length > 0) {
            const node = nodes.pop();
            if (!node) break;
            nodeCount++;
            maxDepth = Math.max(maxDepth, node.depth);
            nodes.push(...node.children);
        }

        return { nodeCount, maxDepth, entryCount: this.numTargets() };
    }
}
