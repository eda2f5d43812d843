export enum Instrument {
  MICRO_NASDAQ = 'Micro NASDAQ Futures',
  MICRO_ES = 'Micro ES Futures',
}

export enum Direction {
  LONG = 'Long',
  SHORT = 'Short',
}

// Journal entry for one round-turn futures trade, stored as-is in the JSON file.
// pnl is derived from the other fields on every save and never edited directly.
export interface TradeRecord {
  id: string;                     // UUID v4, immutable
  date: string;                   // yyyy-MM-dd
  instrument: string;             // Instrument value, or a legacy name (point value 1)
  direction: Direction;
  contracts: number;
  entry: string;                  // raw text as typed, may not parse
  exit: string;
  commissions: number;            // dollars for the whole trade, not per contract
  fees: number;
  pnl: number;                    // net dollars
  setup: string;
  notes: string;
  tradeImagePath: string | null;  // screenshot owned by this record
  timestamp: string;              // ISO instant of the last save
}
