export { TestGate, formatCommand, gateBlocks } from './test_gate';
export type {
  TestResult,
  TestCommandSource,
  TestDiscovery,
  TestGateResult,
  TestGateDependencies,
} from './test_gate';
