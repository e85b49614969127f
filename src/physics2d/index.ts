/**
 * Physics 2D Broad Phase
 *
 * Quadtree index for overlap queries between many moving, axis-bounded actors.
 */

// Shapes
export type { RectangleF, CircleF, ShapeF } from './shapes';
export {
    rectangle,
    rectangleFromCorners,
    circle,
    cloneShape,
    rectangleRight,
    rectangleBottom,
    rectangleCenter,
    rectangleQuadrants,
    shapePosition,
    rectanglesIntersect,
    circlesIntersect,
    circleIntersectsRectangle,
    shapesIntersect
} from './shapes';

// Collision Layers
export type { CollisionFilter } from './layers';
export { Layers, DEFAULT_FILTER, canDetect } from './layers';

// Errors
export type { QuadTreeErrorCode } from './errors';
export { QuadTreeError } from './errors';

// Spatial Partitioning
export type { CollisionActor } from './quad-tree-entry';
export { QuadTreeEntry } from './quad-tree-entry';
export type { QuadTreeOptions, QuadTreeChildren, QuadTreeNodeInfo, QuadTreeStats } from './quad-tree';
export { QuadTree, DEFAULT_MAX_DEPTH, DEFAULT_MAX_OBJECTS_PER_NODE, enableQuadTreeDebug } from './quad-tree';

// Debug Overlay
export type { DebugDrawTarget, DebugDrawOptions } from './debug-draw';
export { drawQuadTree, describeQuadTree } from './debug-draw';
