/**
 * Testing utilities for code built on the responder core.
 * Import via: import { MockTokenCounter } from "@parley/sdk/testing";
 */

export {
  MockTokenCounter,
  MockHistorySource,
  MockGenerationBackend,
  countWords,
} from "./mock-host.js";
export type { CountFn } from "./mock-host.js";
