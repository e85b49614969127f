/**
 * 2D Bounds Shapes
 *
 * Defines the shapes an actor may expose as its bounds: RectangleF (axis-aligned)
 * and CircleF. Overlap tests are strict, so shapes that only touch along an
 * edge or at a single point do not intersect.
 */

import { Vec2, vec2, vec2Clone, vec2DistanceSq, vec2Clamp } from '../math/vec';

// ============================================
// Types
// ============================================

export interface RectangleF {
    type: 'rectangle';
    /** Left edge */
    x: number;
    /** Top edge */
    y: number;
    width: number;
    height: number;
}

export interface CircleF {
    type: 'circle';
    center: Vec2;
    radius: number;
}

export type ShapeF = RectangleF | CircleF;

// ============================================
// Shape Factories
// ============================================

export function rectangle(x: number, y: number, width: number, height: number): RectangleF {
    return { type: 'rectangle', x, y, width, height };
}

/**
 * Create a rectangle spanning two corners.
 */
export function rectangleFromCorners(min: Vec2, max: Vec2): RectangleF {
    return rectangle(min.x, min.y, max.x - min.x, max.y - min.y);
}

export function circle(x: number, y: number, radius: number): CircleF {
    return { type: 'circle', center: vec2(x, y), radius };
}

export function cloneShape(shape: ShapeF): ShapeF {
    if (shape.type === 'circle') {
        return { ...shape, center: vec2Clone(shape.center) };
    }
    return { ...shape };
}

// ============================================
// Rectangle Helpers
// ============================================

export function rectangleRight(rect: RectangleF): number {
    return rect.x + rect.width;
}

export function rectangleBottom(rect: RectangleF): number {
    return rect.y + rect.height;
}

export function rectangleCenter(rect: RectangleF): Vec2 {
    return vec2(rect.x + rect.width / 2, rect.y + rect.height / 2);
}

/**
 * Split a rectangle into four equal quadrants.
 * Order is fixed: top-left, top-right, bottom-right, bottom-left.
 */
export function rectangleQuadrants(rect: RectangleF): [RectangleF, RectangleF, RectangleF, RectangleF] {
    const min = vec2(rect.x, rect.y);
    const max = vec2(rectangleRight(rect), rectangleBottom(rect));
    const center = rectangleCenter(rect);

    return [
        rectangleFromCorners(min, center),
        rectangleFromCorners(vec2(center.x, min.y), vec2(max.x, center.y)),
        rectangleFromCorners(center, max),
        rectangleFromCorners(vec2(min.x, center.y), vec2(center.x, max.y)),
    ];
}

// ============================================
// Shape Accessors
// ============================================

/**
 * Position used for movement detection.
 * Top-left corner for rectangles, center for circles.
 */
export function shapePosition(shape: ShapeF): Vec2 {
    if (shape.type === 'circle') {
        return vec2Clone(shape.center);
    }
    return vec2(shape.x, shape.y);
}

// ============================================
// Overlap Tests
// ============================================

export function rectanglesIntersect(a: RectangleF, b: RectangleF): boolean {
    return a.x < rectangleRight(b) && rectangleRight(a) > b.x &&
           a.y < rectangleBottom(b) && rectangleBottom(a) > b.y;
}

export function circlesIntersect(a: CircleF, b: CircleF): boolean {
    const radii = a.radius + b.radius;
    return vec2DistanceSq(a.center, b.center) < radii * radii;
}

/**
 * Closest point on the rectangle to the circle center, compared against the radius.
 */
export function circleIntersectsRectangle(c: CircleF, rect: RectangleF): boolean {
    const closest = vec2Clamp(
        c.center,
        vec2(rect.x, rect.y),
        vec2(rectangleRight(rect), rectangleBottom(rect))
    );
    return vec2DistanceSq(c.center, closest) < c.radius * c.radius;
}

export function shapesIntersect(a: ShapeF, b: ShapeF): boolean {
    if (a.type === 'rectangle') {
        return b.type === 'rectangle'
            ? rectanglesIntersect(a, b)
            : circleIntersectsRectangle(b, a);
    }
    return b.type === 'rectangle'
        ? circleIntersectsRectangle(a, b)
        : circlesIntersect(a, b);
}
