/**
 * Broad Phase Errors
 */

export type QuadTreeErrorCode =
    | 'REMOVE_FROM_INTERNAL'   // remove() called on a node that has children
    | 'ENTRY_STILL_INDEXED'    // bounds refreshed while the entry is still in the tree
    | 'INVALID_OPTIONS';       // bad bounds or caps at construction

export class QuadTreeError extends Error {
    readonly code: QuadTreeErrorCode;

    constructor(code: QuadTreeErrorCode, message: string) {
        super(`[QuadTree] ${message}`);
        this.name = 'QuadTreeError';
        this.code = code;
    }
}
