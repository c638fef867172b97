/**
 * Notion API response types (database query endpoint)
 */

export interface NotionNumberProperty {
  type: 'number';
  number: number | null;
}

export interface NotionFormulaProperty {
  type: 'formula';
  formula: {
    type?: string;
    number?: number | null;
  } | null;
}

// Every other property type (title, select, rollup, ...) is opaque here
export interface NotionOtherProperty {
  type: string;
  [key: string]: unknown;
}

export type NotionPropertyValue =
  | NotionNumberProperty
  | NotionFormulaProperty
  | NotionOtherProperty;

export interface NotionPage {
  id: string;
  properties?: Record<string, NotionPropertyValue>;
}

export interface NotionQueryResponse {
  results?: NotionPage[];
  has_more?: boolean;
  next_cursor?: string | null;
}

export interface NotionQueryBody {
  page_size: number;
  start_cursor?: string;
}

export interface NotionErrorBody {
  code?: string;
  message?: string;
}
