import type { ColumnType } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** `date` columns come back as Date from node-postgres and go in as YYYY-MM-DD. */
export type DateColumn = ColumnType<Date, string, string>;

/** node-postgres returns int8 as a string. */
export type Int8 = ColumnType<string, number, number>;

export interface StockPriceHistory {
  ticker: string;
  date: DateColumn;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  adj_close: number | null;
  volume: Int8 | null;
  download_timestamp: Timestamp;
}

export interface StockNews {
  ticker: string;
  id: string;
  title: string;
  summary: string;
  description: string;
  publisher: string;
  link: string;
  publish_time: Timestamp;
  display_time: Timestamp;
  content_type: string;
  thumbnail_url: string;
  is_premium: boolean;
  is_hosted: boolean;
  download_timestamp: Timestamp;
}

/** Default table layout. Table names are configurable, so queries address tables by name. */
export interface WarehouseDatabase {
  stock_price_history: StockPriceHistory;
  stock_news: StockNews;
}
