/**
 * Console output shared by the commands.
 */

import pc from 'picocolors';
import type { ValidationResult } from '@flashless/types';

export const PREFIX = '[flashless]';

/**
 * Warning lines for a validation result with errors: a header, then one
 * line per non-empty set. Empty when there is nothing to report.
 */
export function formatValidationWarnings(validation: ValidationResult): string[] {
    if (!validation.hasErrors) {
        return [];
    }

    const lines = [`${PREFIX} Validation warnings detected. Use --strict to fail fast.`];
    const sets: [string, readonly string[]][] = [
        ['missing required files', validation.missingRequiredFiles],
        ['missing fixtures', validation.missingFixtureFiles],
        ['unresolved routes', validation.unresolvedRoutes],
    ];
    for (const [label, items] of sets) {
        if (items.length > 0) {
            lines.push(`${PREFIX}   ${label}: ${items.join(', ')}`);
        }
    }
    return lines;
}

export function printError(message: string): void {
    console.error(pc.red(`flashless error: ${message}`));
}
