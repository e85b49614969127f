/**
 * Quadtree Broad Phase
 *
 * Features:
 * - Adaptive quadtree over a fixed world rectangle
 * - Entries remember their leaves, so removal never searches the tree
 * - Deduplicated count, merge and query passes
 * - Layer/mask category pruning
 */

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Broad Phase
// ============================================
export * from './physics2d';
