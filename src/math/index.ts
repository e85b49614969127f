/**
 * Math Module
 */

export type { Vec2 } from './vec';
export {
    vec2,
    vec2Clone,
    vec2Sub,
    vec2Equals,
    vec2LengthSq,
    vec2DistanceSq,
    vec2Clamp
} from './vec';
