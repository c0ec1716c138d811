export type RandomSource = () => number;

export interface DataPoint {
  timestampMillis: number;
  value: number;
}

export interface Series {
  dimensionLabels: string[];
  dimensionValues: Record<string, string>;
  timestamps: number[];
  values: number[];
}

export interface ValueRange {
  kind: 'real' | 'integer';
  min: number;
  max: number;
}
