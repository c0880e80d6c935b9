import pino from "pino";
import { config } from "./config";

export const logger = pino({
    level: config.logLevel,
    redact: {
        paths: [
            "token",
            "accessToken",
            "access_token",
            "code",
            "secret",
            "apiKey",
            "apiSecret",
            "client_secret",
            "upstox.apiSecret",
            "upstox.accessToken",
        ],
        remove: true,
    },
    serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
    },
});
