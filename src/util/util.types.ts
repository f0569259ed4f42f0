export type Nullable<T> = T | null;

export type PromiseOrDirect<T> = Promise<T> | T;

export type Dictionary<T> = Record<string, T>;
