export interface RunParams {
  nodeCount: number | null;
  msgsize: number | null;
}

export interface TimingSamples {
  timeOnly: number[];
  timeWithBarrier: number[];
}

export interface SampleStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  stddev: number;
}

export interface Summary extends RunParams {
  timeOnly: SampleStats;
  timeWithBarrier: SampleStats;
}
