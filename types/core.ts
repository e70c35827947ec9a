export type DataType = "infections" | "deaths" | "recoveries" | "active cases" | "tests";
export type AnalysisType = "cases" | "mobility" | "weekends";

export type Weekday =
  | "Sunday"
  | "Monday"
  | "Tuesday"
  | "Wednesday"
  | "Thursday"
  | "Friday"
  | "Saturday";

export type CountryRow = {
  country: string;
  values: Array<number | null>;
};

// dates are ISO (YYYY-MM-DD); every row has one value per date
export type CovidTable = {
  dates: string[];
  rows: CountryRow[];
};

export interface LatestCovidData {
  cases: CovidTable;
  deaths: CovidTable;
  recovered: CovidTable;
  active: CovidTable;
  tests: CovidTable;
}

/** Population in millions, keyed by JHU country name. */
export type PopulationTable = ReadonlyMap<string, number>;

export type AuxiliarySeries = {
  variable: string;
  dates: string[];
  values: Array<number | null>;
};

export type AuxiliaryTable = ReadonlyMap<string, AuxiliarySeries[]>;

export interface AuxiliaryData {
  mobility: AuxiliaryTable;
  government: AuxiliaryTable;
}

export interface CovidDatasets {
  dataDir: string;
  loadedAt: string;
  covid: LatestCovidData;
  population: PopulationTable;
  auxiliary: AuxiliaryData;
}

export interface ProcessingConfig {
  dataType: DataType;
  dailyChange: boolean;
  rollingAverage: boolean;
  normaliseByPopulation: boolean;
  rollingWindow: number;
  /** Keep only the N countries with the highest latest value before normalising. */
  presortCountries: number | null;
  /** Values below the threshold are dropped; the comparison x axis becomes days since it was reached. */
  threshold: number | null;
  countrySet: string[] | null;
}

export type LabelledSeries = {
  label: string;
  dates: string[];
  values: number[];
};

export interface CountrySeriesResult {
  country: string;
  yAxisTitle: string;
  series: LabelledSeries[];
}

export type ComparisonSeries = {
  country: string;
  x: Array<string | number>;
  y: number[];
};

export interface ComparisonResult {
  dataType: DataType;
  yAxisTitle: string;
  xAxisTitle: string | null;
  series: ComparisonSeries[];
}

export type MixtureComponent = {
  mean: number;
  variance: number;
  weight: number;
};

// mean is null for a component that no day was assigned to
export type PeakComponentEstimate = Omit<MixtureComponent, "mean"> & {
  mean: number | null;
  isPeak: boolean;
  days: number;
  firstDate: string | null;
  lastDate: string | null;
  peakDate: string | null;
  peakValue: number | null;
};

export interface PeakPrediction {
  country: string;
  dates: string[];
  values: number[];
  components: PeakComponentEstimate[];
  peakDates: Array<string | null>;
  peakValues: Array<number | null>;
  peakName: string;
  offPeakName: string;
}

export interface PeakPredictionResult {
  yAxisTitle: string;
  components: number;
  threshold: number;
  predictions: PeakPrediction[];
}

export interface WeekendEffectResult {
  country: string;
  dataType: DataType;
  effects: Record<Weekday, number | null>;
}

export interface MobilityAndGovernmentResult {
  country: string;
  mobility: AuxiliarySeries[];
  government: AuxiliarySeries[];
}
