export { test, expect, type TraceFixtures, type TraceStepFn } from './traced-test';
export {
  attachScreenshot,
  finalizeTrace,
  outcomeOf,
  traceStep,
  traceTitle,
  type ScreenshotSource,
  type TraceGrouper,
  type TraceRecorder,
} from './trace-lifecycle';
