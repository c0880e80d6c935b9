import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { AuthenticationFailedError } from "@/lib/errors";
import { nextTokenCutoff } from "@/lib/market/time";
import type { AccessToken } from "@/lib/market/types";
import { AuthCodeSchema, TokenResponseSchema } from "@/lib/validation/upstox";
import { describeFailure, fetchWithTimeout, tryParseJson, type FetchLike } from "../common/http";

export interface UpstoxCredentials {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

type ExchangeOptions = {
    baseUrl?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
    now?: () => Date;
};

/**
 * Credentials from config. Throws when any of the three are missing.
 */
export function credentialsFromConfig(): UpstoxCredentials {
    const { apiKey, apiSecret, redirectUri } = config.upstox;
    if (!apiKey || !apiSecret || !redirectUri) {
        throw new AuthenticationFailedError(
            "Upstox credentials not configured. Required: UPSTOX_API_KEY, UPSTOX_API_SECRET, UPSTOX_REDIRECT_URI"
        );
    }
    return { clientId: apiKey, clientSecret: apiSecret, redirectUri };
}

/**
 * Generate Upstox OAuth authorization URL.
 * User will be redirected to this URL to grant access.
 */
export function getAuthorizationUrl(credentials: Pick<UpstoxCredentials, "clientId" | "redirectUri">, state?: string): string {
    const params = new URLSearchParams({
        response_type: "code",
        client_id: credentials.clientId,
        redirect_uri: credentials.redirectUri,
    });

    if (state) {
        params.append("state", state);
    }

    return `${config.upstox.baseUrl}/login/authorization/dialog?${params.toString()}`;
}

/**
 * Exchange authorization code for access token.
 * The token stops working at the next 03:30 IST cutoff, however early it was issued.
 */
export async function exchangeCodeForToken(
    credentials: UpstoxCredentials,
    code: string,
    options: ExchangeOptions = {}
): Promise<AccessToken> {
    const baseUrl = options.baseUrl ?? config.upstox.baseUrl;
    const fetchImpl = options.fetchImpl ?? fetch;
    const now = options.now ?? (() => new Date());

    const body = new URLSearchParams({
        code: AuthCodeSchema.parse(code),
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        redirect_uri: credentials.redirectUri,
        grant_type: "authorization_code",
    });

    logger.info("Exchanging code for Upstox token");

    let reply: { status: number; ok: boolean; body: unknown };
    try {
        reply = await fetchWithTimeout(
            fetchImpl,
            `${baseUrl}/login/authorization/token`,
            {
                method: "POST",
                headers: {
                    "Content-Type": "application/x-www-form-urlencoded",
                    Accept: "application/json",
                },
                body: body.toString(),
            },
            options.timeoutMs ?? config.http.timeoutMs,
            async (response) => {
                const parsed = tryParseJson(await response.text());
                return { status: response.status, ok: response.ok, body: parsed.ok ? parsed.value : null };
            }
        );
    } catch (error) {
        logger.error({ err: error }, "Failed to exchange Upstox code");
        throw new AuthenticationFailedError(
            `Network error during token exchange: ${describeFailure(error)}`,
            undefined,
            error
        );
    }

    if (!reply.ok) {
        logger.error({ status: reply.status, error: reply.body }, "Upstox token exchange failed");
        throw new AuthenticationFailedError(`Token exchange failed: ${reply.status}`, reply.status);
    }

    const parsed = TokenResponseSchema.safeParse(reply.body);
    if (!parsed.success) {
        throw new AuthenticationFailedError("Token exchange response had no access_token", reply.status, parsed.error);
    }

    const issuedAt = now();
    const expiresAt = nextTokenCutoff(issuedAt);

    logger.info({ expiresAt }, "Upstox token obtained successfully");

    return {
        accessToken: parsed.data.access_token,
        issuedAt,
        expiresAt,
    };
}
