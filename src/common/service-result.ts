export type Ok<T> = { kind: 'ok'; value: T };
export type NotFound = { kind: 'not_found'; message: string };
export type Conflict = { kind: 'conflict'; field: string; message: string };
export type Invalid = { kind: 'invalid'; reason: string };
export type Unauthorized = { kind: 'unauthorized'; message: string };
export type Internal = { kind: 'internal'; message: string };

export type Failure = NotFound | Conflict | Invalid | Unauthorized | Internal;

/**
 * Outcome of a service operation. Services never throw for expected failures;
 * the boundary decides how each kind is presented to the caller.
 */
export type ServiceResult<T> = Ok<T> | Failure;

export const ok = <T>(value: T): Ok<T> => ({ kind: 'ok', value });
export const notFound = (message: string): NotFound => ({ kind: 'not_found', message });
export const conflict = (field: string, message: string): Conflict => ({ kind: 'conflict', field, message });
export const invalid = (reason: string): Invalid => ({ kind: 'invalid', reason });
export const unauthorized = (message: string): Unauthorized => ({ kind: 'unauthorized', message });
export const internal = (message: string): Internal => ({ kind: 'internal', message });
