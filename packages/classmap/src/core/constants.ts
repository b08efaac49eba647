/** Element name every identifier property is stored under. */
export const ID_ELEMENT_NAME = '_id';

/**
 * Order of a property without an explicit order. Sorts after every explicit
 * order; unordered properties keep their declaration order.
 */
export const UNORDERED = Number.MAX_SAFE_INTEGER;
