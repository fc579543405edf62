import * as fc from 'fast-check';

// Driver and queue properties exercise in-process devices, so keep the
// default run count moderate; FISCAL_PROPERTY_RUNS overrides it.
const DEFAULT_NUM_RUNS = 50;

function readRuns(value: string | undefined): number {
  const parsed = value ? parseInt(value, 10) : NaN;
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_NUM_RUNS;
}

const numRuns = readRuns(process.env.FISCAL_PROPERTY_RUNS);
const verbose = process.env.FISCAL_PROPERTY_VERBOSE === 'true';

fc.configureGlobal({
  numRuns,
  verbose,
  endOnFailure: true,
});

export const propertyTestConfig = {
  numRuns,
  verbose,
};
