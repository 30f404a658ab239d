import z from "zod";
import pc from "picocolors";
import { NamedError } from "../../util/errors";
import { LogLevel, type LogThreshold } from "../logger";

export namespace Config {

    export const ConfigError = NamedError.create(
        "ConfigError",
        z.object({
            message: z.string()
        })
    );

    const LOG_LEVELS: Record<string, LogThreshold> = {
        debug: LogLevel.DEBUG,
        info: LogLevel.INFO,
        warn: LogLevel.WARN,
        error: LogLevel.ERROR,
        silent: "SILENT",
    };

    const EnvObject = z.object({
        CVSS_EXPLAIN_LOG_LEVEL: z
            .string()
            .trim()
            .toLowerCase()
            .refine((level) => Object.hasOwn(LOG_LEVELS, level), {
                message: "must be one of debug, info, warn, error, silent"
            })
            .default("warn"),
        CVSS_EXPLAIN_LOG_FILE: z.string().trim().min(1).optional(),
        NO_COLOR: z.string().optional(),
        FORCE_COLOR: z.string().optional()
    });

    const ConfigObject = z.object({
        logLevel: z.union([z.nativeEnum(LogLevel), z.literal("SILENT")]),
        logFile: z.string().optional(),
        color: z.boolean()
    });

    export type Info = z.infer<typeof ConfigObject>;

    /**
     * Build the runtime configuration from environment variables.
     * NO_COLOR always disables colors, FORCE_COLOR enables them, otherwise
     * terminal detection decides.
     */
    export function load(
        env: NodeJS.ProcessEnv = process.env,
        colorSupported: boolean = pc.isColorSupported
    ): Info {
        const parsed = EnvObject.safeParse(env);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const field = issue?.path.join(".") ?? "environment";
            throw new ConfigError({
                message: `Invalid configuration for ${field}: ${issue?.message ?? "unknown error"}`
            });
        }

        const vars = parsed.data;
        const color = vars.NO_COLOR !== undefined
            ? false
            : vars.FORCE_COLOR !== undefined || colorSupported;

        return ConfigObject.parse({
            logLevel: LOG_LEVELS[vars.CVSS_EXPLAIN_LOG_LEVEL],
            logFile: vars.CVSS_EXPLAIN_LOG_FILE,
            color
        });
    }
}
