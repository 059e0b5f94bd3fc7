/**
 * Appends one reference token to a JSON Pointer, escaping `~` and `/` (RFC 6901).
 * @example appendPointer('/paths', '/pets/{id}') === '/paths/~1pets~1{id}'
 */
export function appendPointer(pointer: string, key: string | number): string {
    const token = String(key).replace(/~/g, '~0').replace(/\//g, '~1');
    return `${pointer}/${token}`;
}

/**
 * Returns the unescaped last reference token of a JSON Pointer, or '' for the root pointer.
 */
export function lastSegment(pointer: string): string {
    const index = pointer.lastIndexOf('/');
    if (index === -1) return '';
    return pointer
        .slice(index + 1)
        .replace(/~1/g, '/')
        .replace(/~0/g, '~');
}
