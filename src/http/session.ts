/**
 * Bearer credential for one verification run. Auth operations overwrite the
 * token; every other operation only reads it.
 */
export class Session {
    private currentToken: string | undefined;

    /**
     * Replaces the held token when `candidate` is a non-empty string.
     * Returns whether the token changed hands.
     */
    adoptToken(candidate: unknown): boolean {
        if (typeof candidate !== 'string' || candidate.trim().length === 0) {
            return false;
        }

        this.currentToken = candidate;
        return true;
    }

    authorizationHeader(): Record<string, string> {
        return this.currentToken ? { Authorization: `Bearer ${this.currentToken}` } : {};
    }
}
