export interface Instrument {
  id: string;
  tickSize: number;
  lotSize: number;
  minOrderSize: number;
  // Size of one entry order; defaults to lotSize
  orderSize?: number;
}

export interface PriceBar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface BarHistory {
  instrument: string;
  bars: PriceBar[];
  // Sequence of the newest bar in `bars`
  sequence: number;
}

export type AppendStatus = 'APPENDED' | 'REPLACED' | 'DUPLICATE' | 'OUT_OF_ORDER';

export interface AppendResult {
  status: AppendStatus;
  sequence: number;
  evicted?: PriceBar;
}
