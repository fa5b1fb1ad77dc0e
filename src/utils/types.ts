/**
 * Read-only view of a configuration tree: nested objects and arrays become
 * read-only, functions are left as they are.
 */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
	? T
	: T extends ReadonlyArray<infer U>
	? ReadonlyArray<DeepReadonly<U>>
	: T extends object
	? { readonly [P in keyof T]: DeepReadonly<T[P]> }
	: T;
