/**
 * Sender allow-list.
 *
 * An empty list means open mode: every sender is served. Startup code is
 * expected to warn about that; this module only answers the question.
 */

export class AccessGuard {
	private readonly allowed: ReadonlySet<number>;

	constructor(allowedUsers: Iterable<number> = []) {
		this.allowed = new Set(allowedUsers);
	}

	/** True when no allow-list is configured. */
	get isOpen(): boolean {
		return this.allowed.size === 0;
	}

	get size(): number {
		return this.allowed.size;
	}

	isAllowed(senderIdentity: number): boolean {
		if (this.allowed.size === 0) return true;
		return this.allowed.has(senderIdentity);
	}
}

export function createAccessGuard(allowedUsers: Iterable<number>): AccessGuard {
	return new AccessGuard(allowedUsers);
}
