export const REDACTED = "[REDACTED]";

/**
 * Replace every occurrence of the given secrets in a string. Empty secrets
 * are ignored.
 */
export function redactSecrets(text: string, secrets: readonly string[]): string {
	let result = text;
	for (const secret of secrets) {
		if (!secret) continue;
		result = result.split(secret).join(REDACTED);
	}
	return result;
}
