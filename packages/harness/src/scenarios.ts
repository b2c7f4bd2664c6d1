import { ConfigError } from '@tombcheck/core';
import type { HarnessConfig, ScenarioDefinition } from '@tombcheck/core';

export const SINGLE_NODE_RESTART = 'single-node-restart';
export const PARTIAL_DELETE_FAILURE = 'partial-delete-failure';

export const SCENARIO_NAMES = [SINGLE_NODE_RESTART, PARTIAL_DELETE_FAILURE] as const;

export type ScenarioName = (typeof SCENARIO_NAMES)[number];

/** File names of the uploaded test set: test_movie_0000.mp4, test_movie_0001.mp4, ... */
export function testFileNames(from: number, to: number): string[] {
  const names: string[] = [];
  for (let i = from; i < to; i++) {
    names.push(`test_movie_${String(i).padStart(4, '0')}.mp4`);
  }
  return names;
}

/** Every file the catalogue touches, in order. */
export const DEFAULT_TEST_FILES: readonly string[] = testFileNames(0, 20);

export function isScenarioName(value: string): value is ScenarioName {
  return SCENARIO_NAMES.some((name) => name === value);
}

function faultNodesFor(name: ScenarioName, config: HarnessConfig): string[] {
  const nodes = config.faultNodes[name];
  if (!nodes || nodes.length === 0) {
    throw new ConfigError(`No fault nodes configured for scenario "${name}"`);
  }
  return [...nodes];
}

/**
 * Build the scenario catalogue from configuration.
 *
 * - single-node-restart: one node down while ten files are deleted, then
 *   restarted; leftover replicas must be cleaned on re-registration.
 * - partial-delete-failure: two nodes down so deletes reach only part of the
 *   replicas; the coordinator must log the partial failure and still converge.
 */
export function buildScenarios(config: HarnessConfig): ScenarioDefinition[] {
  return [
    {
      name: SINGLE_NODE_RESTART,
      title: 'Delete while a node is down, then restart it',
      targetFiles: testFileNames(0, 10),
      faultNodes: faultNodesFor(SINGLE_NODE_RESTART, config),
      expectDeleteFailure: false,
      checkPartialFailure: false,
      settleAfterStopMs: config.timing.settleAfterStopMs,
    },
    {
      name: PARTIAL_DELETE_FAILURE,
      title: 'Partial delete failure with two nodes down',
      targetFiles: testFileNames(10, 20),
      faultNodes: faultNodesFor(PARTIAL_DELETE_FAILURE, config),
      expectDeleteFailure: true,
      checkPartialFailure: true,
      settleAfterStopMs: config.timing.settleAfterStopMs * 2,
    },
  ];
}

/** Select scenarios by name; "all" keeps the whole catalogue in order. */
export function selectScenarios(
  catalogue: readonly ScenarioDefinition[],
  selection: string,
): ScenarioDefinition[] {
  if (selection === 'all') return [...catalogue];
  const match = catalogue.filter((scenario) => scenario.name === selection);
  if (match.length === 0) {
    throw new ConfigError(
      `Unknown scenario "${selection}". Expected one of: all, ${catalogue.map((s) => s.name).join(', ')}`,
    );
  }
  return match;
}
