/**
 * @logictrace/fixtures - data-driven rule fixtures
 */
export { parseFixtureFile, loadFixtureFile, logicValueSchema, fixtureEntrySchema, fixtureFileSchema } from "./types.js";
export type { FixtureCase, FixtureSuite } from "./types.js";
export {
  discoverFixtureFiles,
  applyFixtureTextFilter,
  getFixtureRoots,
  FIXTURE_SUFFIX,
} from "./discovery.js";
export type { DiscoveredFixture } from "./discovery.js";
export { describeMismatch, assertSameValue } from "./assertions.js";
export {
  runFixtureCase,
  runFixtureSuite,
  summarize,
  mergeSummaries,
  formatOutcome,
} from "./runner.js";
export type { FixtureOutcome, FixtureSummary, SuiteReport } from "./runner.js";
