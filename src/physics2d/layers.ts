/**
 * Collision Layers
 *
 * Controls which entries are reported to each other using bitmasks.
 * Layer = "what am I", Mask = "what do I test against"
 */

// ============================================
// Collision Filter
// ============================================

export interface CollisionFilter {
    /** Which layer(s) this entry belongs to */
    layer: number;
    /** Which layers this entry tests against (bitmask) */
    mask: number;
}

// ============================================
// Default Layers
// ============================================

export const Layers = {
    NONE: 0,
    DEFAULT: 1 << 0,      // 1
    PLAYER: 1 << 1,       // 2
    ENEMY: 1 << 2,        // 4
    PROJECTILE: 1 << 3,   // 8
    ITEM: 1 << 4,         // 16
    TRIGGER: 1 << 5,      // 32
    WORLD: 1 << 6,        // 64
    PROP: 1 << 7,         // 128
    // Layers 8-15 reserved for game-specific use
    CUSTOM_1: 1 << 8,
    CUSTOM_2: 1 << 9,
    CUSTOM_3: 1 << 10,
    CUSTOM_4: 1 << 11,
    CUSTOM_5: 1 << 12,
    CUSTOM_6: 1 << 13,
    CUSTOM_7: 1 << 14,
    CUSTOM_8: 1 << 15,
    ALL: 0xFFFF
} as const;

/**
 * Default filter - on the default layer, tests against everything
 */
export const DEFAULT_FILTER: Readonly<CollisionFilter> = {
    layer: Layers.DEFAULT,
    mask: Layers.ALL
};

// ============================================
// Filter Check
// ============================================

/**
 * One-directional check: does `querier` test against `candidate`'s layer bits?
 * `candidate` may also be a leaf, whose layer is the union of its contents.
 */
export function canDetect(querier: Pick<CollisionFilter, 'mask'>, candidate: Pick<CollisionFilter, 'layer'>): boolean {
    return (querier.mask & candidate.layer) !== 0;
}
