/** The only key of a reference object. */
export const REF_KEY = '$ref';

/** Conventional prefix of specification extension keys. */
export const EXTENSION_PREFIX = 'x-';

/** Every key of the path collection that starts with this character is a path template. */
export const PATH_PREFIX = '/';

/** HTTP methods with a fixed field on a Path Item, in canonical order. */
export const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch', 'trace'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const DEFAULT_MAX_DEPTH = 256;
