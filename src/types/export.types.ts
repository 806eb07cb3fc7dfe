/**
 * Export Output Type Definitions
 */

import type { JsonValue } from './conversation.types';

/**
 * Wrapper written around the filtered conversations when the header is enabled
 */
export type ExportHeader = {
    user_id: string;
    user_display: string;
    export_date: string;
    conversation_count: number;
    conversations: JsonValue[];
};

export type ExportPayload = ExportHeader | JsonValue[];

export type ExportOptions = {
    userId: string;
    displayName: string;
    includeHeader: boolean;
    exportDate?: Date;
};

export type ExportSummary = {
    outputPath: string;
    conversationCount: number;
    includeHeader: boolean;
    bytesWritten: number;
};
