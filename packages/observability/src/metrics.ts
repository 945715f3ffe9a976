export type MetricType = "counter" | "timing";

export type MetricTags = Record<string, string>;

export type MetricRecord = {
  name: string;
  type: MetricType;
  value: number;
  ts: number;
  service?: string;
  tags?: MetricTags;
};

export type MetricsEmitter = (record: MetricRecord) => void;

export type MetricsOptions = {
  service?: string;
  emit?: MetricsEmitter;
  now?: () => number;
};

export type Metrics = {
  count: (name: string, value?: number, tags?: MetricTags) => void;
  // Returns a stop function that records the elapsed time as a timing.
  startTimer: (name: string, tags?: MetricTags) => () => number;
};

const noopEmit: MetricsEmitter = () => {};

export const createMetrics = ({
  service,
  emit = noopEmit,
  now = () => Date.now()
}: MetricsOptions = {}): Metrics => {
  const write = (type: MetricType, name: string, value: number, tags?: MetricTags) => {
    emit({
      name,
      type,
      value,
      tags,
      service,
      ts: now()
    });
  };

  return {
    count: (name, value = 1, tags) => write("counter", name, value, tags),
    startTimer: (name, tags) => {
      const startedAt = now();
      return () => {
        const elapsed = now() - startedAt;
        write("timing", name, elapsed, tags);
        return elapsed;
      };
    }
  };
};
