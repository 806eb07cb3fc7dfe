import type { ExportOptions, ExportPayload, IdentityMapping, JsonValue } from '../types';
import { normaliseUserId } from '../analysis/field.resolver';
import { OUTPUT_EXTENSION, OUTPUT_FILE_PREFIX } from '../utils/constants';
import { sanitiseFileNameComponent } from '../utils/text.utils';

// ============================================================================
// OUTPUT UTILITIES
// ============================================================================

/**
 * Wraps the conversations in header metadata, or returns them bare
 */
export function buildExportPayload(conversations: JsonValue[], options: ExportOptions): ExportPayload {
    if (!options.includeHeader) {
        return conversations;
    }

    return {
        user_id: options.userId,
        user_display: options.displayName,
        export_date: (options.exportDate ?? new Date()).toISOString(),
        conversation_count: conversations.length,
        conversations
    };
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatFileTimestamp(date: Date): string {
    const pad = (value: number) => value.toString().padStart(2, '0');
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}

/**
 * Default output file name. Uses the user's name from the identity file when there
 * is one, otherwise the identifier.
 */
export function getDefaultOutputFileName(userId: JsonValue, identities: IdentityMapping, date: Date = new Date()): string {
    const id = normaliseUserId(userId);
    const name = identities.get(id)?.name;
    const label = name ? name.replace(/ /g, '_') : id;
    return `${OUTPUT_FILE_PREFIX}_${sanitiseFileNameComponent(label)}_${formatFileTimestamp(date)}${OUTPUT_EXTENSION}`;
}
