import { ConfigError, type Artifact, type ProvisionConfig } from '@provisioner/shared';
import type { WorkingArea } from '../workspace/working-area';

/**
 * Bootstrap artifacts in registration order: the shared framework first,
 * then the UI framework, and the package manager's own installer last.
 */
export const BOOTSTRAP_ORDER = ['framework', 'uiFramework', 'packageManager'] as const;

export type BootstrapSlot = (typeof BOOTSTRAP_ORDER)[number];

export interface ProvisionPlan {
  readonly bootstrap: readonly Artifact[];
  readonly configuration: Artifact;
}

/**
 * Builds the immutable artifact list for a run. Throws ConfigError when two
 * artifacts would be written to the same file.
 */
export function buildPlan(config: ProvisionConfig, area: WorkingArea): ProvisionPlan {
  const bootstrap = BOOTSTRAP_ORDER.map((slot) => {
    const source = config.artifacts[slot];
    return Object.freeze({
      name: slot,
      url: source.url,
      destination: area.resolve(source.fileName),
    });
  });
  const configuration = Object.freeze({
    name: 'configuration',
    url: config.configuration.url,
    destination: area.resolve(config.configuration.fileName),
  });

  const seen = new Map<string, string>();
  for (const artifact of [...bootstrap, configuration]) {
    const key = artifact.destination.toLowerCase();
    const previous = seen.get(key);
    if (previous) {
      throw new ConfigError(
        `Artifacts "${previous}" and "${artifact.name}" share the file name ${artifact.destination}`,
      );
    }
    seen.set(key, artifact.name);
  }

  return Object.freeze({ bootstrap: Object.freeze(bootstrap), configuration });
}
