/**
 * Shared test utilities.
 *
 *   import { FakePool, setupParseMock, createRecord } from "../test-utils/index.js";
 */

export { FakePool, type RecordedQuery } from "./fake-pool.js";
export {
  setupParseMock,
  cleanupParseMock,
  createEslFixture,
  PARSE_SERVER,
  PARSE_ROOT,
  PARSE_COLLECTION,
  PARSE_APP_ID,
  PARSE_API_KEY,
  type ParseMock,
} from "./parse-mock.js";
export { createRecord } from "./records.js";
