/**
 * 2D Vector Types
 *
 * Plain floating-point vectors used by shapes and the broad phase.
 */

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Equals(a: Vec2, b: Vec2): boolean {
    return a.x === b.x && a.y === b.y;
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2DistanceSq(a: Vec2, b: Vec2): number {
    return vec2LengthSq(vec2Sub(b, a));
}

/** Clamp each component of v into [min, max] */
export function vec2Clamp(v: Vec2, min: Vec2, max: Vec2): Vec2 {
    return {
        x: Math.max(min.x, Math.min(max.x, v.x)),
        y: Math.max(min.y, Math.min(max.y, v.y))
    };
}
