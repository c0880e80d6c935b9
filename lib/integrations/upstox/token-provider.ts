/**
 * Upstox Token Provider
 *
 * Reads the bearer token handed in through UPSTOX_ACCESS_TOKEN.
 * Tokens are never refreshed here; an expired one surfaces as a 401 from Upstox
 * and the operator runs scripts/generate-upstox-token.ts again.
 */

import { config } from "@/lib/config";
import { AuthenticationFailedError } from "@/lib/errors";
import { logger } from "@/lib/logger";

export class UpstoxTokenProvider {
    constructor(private readonly configuredToken: string | undefined = config.upstox.accessToken) {}

    private normalizeToken(token: string): string {
        return token.replace(/^Bearer\s+/i, "").trim();
    }

    /**
     * @throws AuthenticationFailedError if token is not configured
     */
    getToken(): string {
        const token = this.configuredToken ? this.normalizeToken(this.configuredToken) : "";

        if (!token) {
            logger.error("Upstox access token not configured");
            throw new AuthenticationFailedError(
                "Upstox access token not configured. Run: npx tsx scripts/generate-upstox-token.ts <CODE>"
            );
        }

        // Log token retrieval (token is auto-redacted by logger)
        logger.debug("Upstox token retrieved from environment");

        return token;
    }

    hasToken(): boolean {
        return Boolean(this.configuredToken && this.normalizeToken(this.configuredToken));
    }
}
