/**
 * html-search — Result values
 *
 * Parsing and file loading report failure by returning a `Result` rather than
 * throwing, so a caller can stop at the first failure in input order without
 * wrapping every call in `try`.
 */

export interface Success<T> {
	readonly ok: true;
	readonly value: T;
}

export interface Failure<E> {
	readonly ok: false;
	readonly error: E;
}

export type Result<T, E> = Success<T> | Failure<E>;

export function success<T>(value: T): Success<T> {
	return { ok: true, value };
}

export function failure<E>(error: E): Failure<E> {
	return { ok: false, error };
}
