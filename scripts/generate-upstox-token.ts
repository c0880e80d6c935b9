/**
 * Upstox Token Generator Script
 *
 * Usage: npx tsx scripts/generate-upstox-token.ts [AUTH_CODE] [--write-env]
 *
 * Exchanges an Upstox OAuth authorization code (argument, or UPSTOX_AUTH_CODE)
 * for an access token. With --write-env, UPSTOX_AUTH_CODE and UPSTOX_ACCESS_TOKEN
 * are appended to .env unless already present.
 *
 * To get the auth code:
 * 1. Run without a code to print the login URL
 * 2. Login with your Upstox credentials
 * 3. Copy the 'code' parameter from the redirect URL
 */

import "dotenv/config";
import { config } from "@/lib/config";
import { handleError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { appendMissingEnvKeys } from "@/lib/env-file";
import { credentialsFromConfig, exchangeCodeForToken, getAuthorizationUrl } from "@/lib/integrations/upstox/auth";

/**
 * Mask token for safe logging - shows only last 6 characters
 */
function maskToken(token: string): string {
    if (token.length <= 6) return "******";
    return "*".repeat(Math.min(token.length - 6, 20)) + token.slice(-6);
}

async function main(): Promise<void> {
    const credentials = credentialsFromConfig();

    const args = process.argv.slice(2);
    const writeEnv = args.includes("--write-env");
    const code = args.find((arg) => !arg.startsWith("--")) ?? config.upstox.authCode;

    if (!code) {
        console.error("❌ ERROR: Missing authorization code");
        console.error("Usage: npx tsx scripts/generate-upstox-token.ts <AUTH_CODE> [--write-env]");
        console.error("");
        console.error("To get the code, visit:");
        console.error(getAuthorizationUrl(credentials));
        process.exit(1);
    }

    const token = await exchangeCodeForToken(credentials, code);

    // Log masked token (safe logging)
    logger.info({ masked: maskToken(token.accessToken) }, "Token received successfully");

    console.log("");
    console.log("✅ SUCCESS: Token obtained!");
    console.log("");
    console.log("─".repeat(50));
    console.log(`UPSTOX_ACCESS_TOKEN=${token.accessToken}`);
    console.log("─".repeat(50));
    console.log(`Valid until: ${token.expiresAt.toISOString()} (03:30 IST cutoff)`);
    console.log("");

    if (writeEnv) {
        const written = await appendMissingEnvKeys(".env", {
            UPSTOX_AUTH_CODE: code,
            UPSTOX_ACCESS_TOKEN: token.accessToken,
        });
        console.log(written.length > 0 ? `📝 .env updated: ${written.join(", ")}` : "📝 .env already has both keys");
    }
}

main().catch((error: unknown) => {
    const report = handleError(error);
    console.error(`❌ ERROR [${report.code}]: ${report.message}`);
    process.exit(1);
});
