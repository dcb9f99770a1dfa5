export const PACKAGE_NAME = "@veracity/test-utils" as const;

export { createRecordingWaiter, ManualClock, type RecordingWaiter } from "./clock.js";
export {
  jsonResponse,
  mockFetch,
  type OpenSseStream,
  openSseResponse,
  type RecordedRequest,
  recordedRequest,
  type ScriptedInit,
  sseData,
  sseResponse,
  textResponse,
} from "./http.js";
export {
  type MockBackendType,
  MockEvaluationProvider,
  type MockEvaluationRequest,
  type MockOutcome,
  type MockProviderOptions,
} from "./mock-provider.js";
