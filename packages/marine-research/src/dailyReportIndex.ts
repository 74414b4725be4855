import type { IndexDefinition } from '@tideline/document-store-client';

export type ScenarioNames = {
  collection: string;
  outputCollection: string;
  indexName: string;
};

export function buildScenarioNames(runId: string): ScenarioNames {
  return {
    collection: `C${runId}`,
    outputCollection: `DailyReport${runId}`,
    indexName: `Index${runId}`
  };
}

/** Map/reduce index averaging the day's readings into the output collection. */
export function buildDailyReportIndex(names: ScenarioNames): IndexDefinition {
  return {
    name: names.indexName,
    maps: [
      `from measurement in docs.${names.collection} select new {
    Day = measurement.Time,
    Temperature = measurement.Temperature,
    Salinity = measurement.Salinity
}`
    ],
    reduce: `from result in results group result by result.Day into g select new {
    Day = g.Key,
    Temperature = g.Average(x => x.Temperature),
    Salinity = g.Average(x => x.Salinity)
}`,
    outputReduceToCollection: names.outputCollection
  };
}

export function buildDailyReportQuery(names: ScenarioNames): string {
  return `from ${names.outputCollection} as c
select {
    Day: c.Day,
    Temperature: c.Temperature,
    Salinity: c.Salinity
}`;
}
