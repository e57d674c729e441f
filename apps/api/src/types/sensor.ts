export type SensorValues = {
  ph: number;
  tds: number;
  turbidity: number;
  temperature: number;
};

export type SensorReading = SensorValues & {
  id: number;
  ts: number; // epoch ms, UTC
  source: string | null;
};

export type NewReading = SensorValues & {
  ts?: number;
  source?: string | null;
};

export type DailyAggregate = {
  avgPh: number;
  avgTds: number;
  avgTurbidity: number;
  avgTemperature: number;
  readingCount: number;
};

export type DailyPrediction = DailyAggregate & {
  id: number;
  date: string; // YYYY-MM-DD, UTC calendar date
  prediction: string;
  confidence: number | null;
  computedAt: number;
};
