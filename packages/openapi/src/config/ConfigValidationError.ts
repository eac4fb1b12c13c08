/**
 * ConfigValidationError — Readable Config File Errors
 *
 * Wraps the Zod error raised while validating a config file with the
 * path of that file, listing every invalid key on its own line:
 *
 * ```
 * Invalid config in "/work/typeshape.yaml":
 *   • 'formats.date': Invalid enum value. Expected 'date-time' | 'date', received 'time'
 * ```
 *
 * @module
 */
import type { ZodError } from 'zod';

export class ConfigValidationError extends Error {
    /** Absolute path of the offending file */
    readonly filePath: string;

    constructor(filePath: string, zodError: ZodError) {
        const fieldErrors = zodError.issues
            .map(issue => {
                const path = issue.path.length > 0
                    ? `'${issue.path.join('.')}'`
                    : '(root)';
                return `  • ${path}: ${issue.message}`;
            })
            .join('\n');

        super(`Invalid config in "${filePath}":\n${fieldErrors}`, { cause: zodError });
        this.name = 'ConfigValidationError';
        this.filePath = filePath;
    }
}
