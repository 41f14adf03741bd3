import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { dump } from 'js-yaml';
import { initWorkspace } from '../workspace/init.js';
import { getReelPaths } from '../workspace/paths.js';
import { parseReelConfig, readSecrets } from '../workspace/config.js';
import { buildServices, type Services } from '../runtime/services.js';
import type { ReelConfig, ReelPaths } from '../workspace/types.js';
import {
  FakeCaptions,
  FakeChannels,
  FakeClock,
  FakeDownloader,
  FakeGateway,
  FakeDurationReader,
  FakePublisher,
  FakeScorer,
  FakeTranscoder,
} from './fakes.js';

export interface TempWorkspace {
  workspaceDir: string;
  paths: ReelPaths;
  config: ReelConfig;
  cleanup: () => void;
}

export type ConfigOverrides = { [K in keyof ReelConfig]?: Partial<ReelConfig[K]> };

/**
 * Initialized workspace in a temp dir. Section overrides are merged over the
 * defaults and written to config.yaml so CLI commands see them too.
 */
export function createTempWorkspace(overrides: ConfigOverrides = {}): TempWorkspace {
  const root = mkdtempSync(join(tmpdir(), 'reelrunner-ws-'));
  const base = initWorkspace({ cwd: root });

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current: unknown = Reflect.get(base, key);
    merged[key] =
      current && typeof current === 'object' && value && typeof value === 'object'
        ? { ...current, ...value }
        : value;
  }
  const config = parseReelConfig(merged);
  const paths = getReelPaths(root);
  writeFileSync(paths.config, dump(config), 'utf8');

  return {
    workspaceDir: root,
    paths,
    config,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export function makeTempDir(prefix = 'reelrunner-test-'): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

export interface TestHarness extends TempWorkspace {
  services: Services;
  fakes: {
    clock: FakeClock;
    channels: FakeChannels;
    downloader: FakeDownloader;
    durationReader: FakeDurationReader;
    scorer: FakeScorer;
    transcoder: FakeTranscoder;
    captions: FakeCaptions;
    gateway: FakeGateway;
    publisher: FakePublisher;
  };
}

/** Workspace plus fully wired services, every external collaborator faked. */
export function createTestHarness(overrides: ConfigOverrides = {}): TestHarness {
  const ws = createTempWorkspace(overrides);
  const fakes = {
    clock: new FakeClock(),
    channels: new FakeChannels(),
    downloader: new FakeDownloader(),
    durationReader: new FakeDurationReader(),
    scorer: new FakeScorer(),
    transcoder: new FakeTranscoder(),
    captions: new FakeCaptions(),
    gateway: new FakeGateway(),
    publisher: new FakePublisher(),
  };
  const services = buildServices(ws.paths, ws.config, readSecrets({}), { ...fakes, clippingApi: null });
  return { ...ws, services, fakes };
}
