// Export types

export const EXPORT_FORMATS = ['markdown', 'json', 'checklist'] as const;
export type ExportFormat = typeof EXPORT_FORMATS[number];

export interface ExportedDocument {
  content: string;
  mediaType: string;
  filename: string;
}
