import { logger } from '../logging/logger.js';

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: NodeJS.ProcessEnv) => boolean; message: string }
    | { type: 'assert'; check: (env: NodeJS.ProcessEnv) => boolean; message: string };

/**
 * Fail-closed configuration guard.
 * No defaults. No missing values. No unsafe patterns.
 */
export class ConfigGuard {
    /**
     * Evaluates every rule and returns the violations without side effects.
     */
    static check(rules: GuardRule[], env: NodeJS.ProcessEnv = process.env): string[] {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                const message = err instanceof Error ? err.message : String(err);
                errors.push(`Check failed for rule: ${message}`);
            }
        }

        return errors;
    }

    static enforce(rules: GuardRule[], env: NodeJS.ProcessEnv = process.env): void {
        const errors = ConfigGuard.check(rules, env);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            // Immediate fatal exit
            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}
