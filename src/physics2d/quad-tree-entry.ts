/**
 * QuadTree Entry
 *
 * Wraps one actor registered with the broad phase. The entry keeps a
 * snapshot of the actor's bounds; the tree only ever reads that snapshot,
 * so a moved actor must be removed from all of its nodes, refreshed with
 * updateBounds() and inserted again from the root.
 *
 * The entry also remembers every leaf currently holding it, which makes
 * removal a walk over its own parents instead of a search of the tree.
 *
 * Degenerate bounds (zero width or height) lying exactly on a split line
 * overlap no child quadrant and are not indexed once their leaf splits.
 */

import type { QuadTree } from './quad-tree';
import { ShapeF, cloneShape, shapePosition } from './shapes';
import { CollisionFilter, DEFAULT_FILTER } from './layers';
import { QuadTreeError } from './errors';
import { Vec2, vec2Equals } from '../math/vec';

// ============================================
// Actor Contract
// ============================================

/**
 * Anything that can be indexed: exposes its current bounds and,
 * optionally, its collision layer and mask.
 */
export interface CollisionActor {
    bounds: ShapeF;
    /** Defaults to DEFAULT_FILTER.layer */
    layer?: number;
    /** Defaults to DEFAULT_FILTER.mask */
    mask?: number;
}

// ============================================
// Entry
// ============================================

export class QuadTreeEntry<T extends CollisionActor = CollisionActor> implements CollisionFilter {
    readonly target: T;

    /** What this entry is */
    readonly layer: number;

    /** What this entry tests against */
    readonly mask: number;

    private _bounds: ShapeF;
    private previousPosition: Vec2;
    private readonly parents = new Set<QuadTree<T>>();

    /**
     * Traversal marker. Only meaningful while a count, merge or query
     * pass is running; whoever sets it is responsible for clearing it.
     */
    private _dirty = false;

    constructor(target: T) {
        this.target = target;
        this.layer = target.layer ?? DEFAULT_FILTER.layer;
        this.mask = target.mask ?? DEFAULT_FILTER.mask;
        this._bounds = cloneShape(target.bounds);
        this.previousPosition = shapePosition(this._bounds);
    }

    /** Bounds snapshot the tree indexes this entry by */
    get bounds(): Readonly<ShapeF> {
        return this._bounds;
    }

    get dirty(): boolean {
        return this._dirty;
    }

    /** Leaves currently holding this entry */
    get parentNodes(): ReadonlySet<QuadTree<T>> {
        return this.parents;
    }

    /** True while at least one leaf holds this entry */
    get isIndexed(): boolean {
        return this.parents.size > 0;
    }

    addParent(parent: QuadTree<T>): void {
        this.parents.add(parent);
    }

    removeParent(parent: QuadTree<T>): void {
        this.parents.delete(parent);
    }

    /**
     * Detach from every leaf holding this entry.
     * Required before repositioning or deregistering the actor.
     */
    removeFromAllParents(): void {
        for (const parent of [...this.parents]) {
            parent.remove(this);
        }
        this.parents.clear();
    }

    markDirty(): void {
        this._dirty = true;
    }

    markClean(): void {
        this._dirty = false;
    }

    /**
     * Has the actor moved since the bounds snapshot was taken?
     */
    isPositionDirty(): boolean {
        return !vec2Equals(shapePosition(this.target.bounds), this.previousPosition);
    }

    /**
     * Re-snapshot the actor's bounds. Only allowed while detached.
     */
    updateBounds(): void {
        if (this.parents.size > 0) {
            throw new QuadTreeError(
                'ENTRY_STILL_INDEXED',
                `Cannot refresh bounds of an entry still held by ${this.parents.size} node(s); call removeFromAllParents() first`
            );
        }
        this._bounds = cloneShape(this.target.bounds);
        this.previousPosition = shapePosition(this._bounds);
    }
}
