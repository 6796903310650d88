/**
 * Test helpers shared by the calsel packages
 */

export {
  createTempRoot,
  removeDir,
  writeRulesFile,
  writeFixture,
  withTempStore,
  withTempDir,
  type TempStoreDirs,
  type TempStoreOptions,
} from "./fs.js";
export { ARC_RULES, FLAT_RULES, header } from "./fixtures.js";
