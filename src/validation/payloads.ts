/**
 * Shapes of the raw payloads, mirroring schemas/*.schema.json
 */

export interface SecCompanyTickerRow {
  cik_str: number | string;
  ticker: string;
  title: string;
}

/** company_tickers.json is keyed by row index ("0", "1", ...) */
export type SecCompanyTickersPayload = Record<string, SecCompanyTickerRow>;

export interface WikidataSearchItem {
  id: string;
  label?: string;
  description?: string;
}

export interface WikidataSearchPayload {
  search: WikidataSearchItem[];
}

export interface WikidataSnak {
  snaktype?: string;
  property?: string;
  datavalue?: {
    type?: string;
    value?: unknown;
  };
}

export interface WikidataClaim {
  mainsnak?: WikidataSnak;
  rank?: string;
  qualifiers?: Record<string, WikidataSnak[]>;
}

export interface WikidataRawEntity {
  id?: string;
  labels?: Record<string, { language?: string; value: string }>;
  claims?: Record<string, WikidataClaim[]>;
}

export interface WikidataEntityPayload {
  entities: Record<string, WikidataRawEntity>;
}
