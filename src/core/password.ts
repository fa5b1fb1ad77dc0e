import { createHash } from "crypto";

/**
 * SHA256 of the password with the configured salt appended.
 *
 * @example
 * const hash = hashPassword("hunter2", CONFIG.security.password_salt);
 */
export function hashPassword(password: string, salt: string): string {
	return createHash("sha256")
		.update(password + salt)
		.digest("hex");
}
