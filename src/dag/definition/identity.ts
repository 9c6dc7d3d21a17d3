/**
 * @file Type Identity
 *
 * Default job ids come from the payload's type. The engine only needs a
 * stable string; callers with their own notion of job type pass a
 * different TypeIdentity to the definition.
 *
 * @module dag/definition
 */

export type TypeIdentity = (payload: unknown) => string;

/**
 * Class name for instances, function name for functions, `typeof`
 * otherwise. Plain objects yield 'Object'.
 */
export function typeIdentity_default(payload: unknown): string {
    if (typeof payload === 'function' && payload.name) {
        return payload.name;
    }
    if (typeof payload === 'object' && payload !== null) {
        const proto: unknown = Object.getPrototypeOf(payload);
        if (typeof proto === 'object' && proto !== null && 'constructor' in proto) {
            const ctor = proto.constructor;
            if (typeof ctor === 'function' && ctor.name) return ctor.name;
        }
        return 'Object';
    }
    return typeof payload;
}
