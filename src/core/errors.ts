/**
 * Game error taxonomy.
 *
 * Every failure a player or admin can provoke is a {@link GameError}; its
 * message is the text sent back to them. {@link StorageCorruptionError} is
 * the one fatal error and never reaches a player.
 *
 * @module core/errors
 */

export enum ERROR_CODE {
	DUPLICATE_NAME = "duplicate_name",
	INVALID_CREDENTIALS = "invalid_credentials",
	NOT_FOUND = "not_found",
	UNAUTHORIZED = "unauthorized",
	VALIDATION = "validation",
	CONSTRAINT_VIOLATION = "constraint_violation",
}

export abstract class GameError extends Error {
	abstract readonly code: ERROR_CODE;
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** A player name is already taken (names compare case-insensitively). */
export class DuplicateNameError extends GameError {
	readonly code = ERROR_CODE.DUPLICATE_NAME;
	constructor(readonly username: string) {
		super(`Sorry, that character name is already in use.`);
	}
}

export class InvalidCredentialsError extends GameError {
	readonly code = ERROR_CODE.INVALID_CREDENTIALS;
	constructor(message = "Wrong password.") {
		super(message);
	}
}

export class NotFoundError extends GameError {
	readonly code = ERROR_CODE.NOT_FOUND;
	constructor(readonly target: string, message = `No such user: ${target}`) {
		super(message);
	}
}

export class UnauthorizedError extends GameError {
	readonly code = ERROR_CODE.UNAUTHORIZED;
	constructor(message = "Access denied.") {
		super(message);
	}
}

export class ValidationError extends GameError {
	readonly code = ERROR_CODE.VALIDATION;
}

/** A write would break a data-model invariant. */
export class ConstraintViolationError extends GameError {
	readonly code = ERROR_CODE.CONSTRAINT_VIOLATION;
}

/**
 * The durable record store holds data that cannot be read back.
 * Raised at load time; the process stops instead of serving bad state.
 */
export class StorageCorruptionError extends Error {
	constructor(readonly path: string, detail: string) {
		super(`Corrupt record at ${path}: ${detail}`);
		this.name = "StorageCorruptionError";
	}
}

export function isGameError(error: unknown): error is GameError {
	return error instanceof GameError;
}
