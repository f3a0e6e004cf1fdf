import { JobSource } from './base';
import { JSearchSource } from './jsearch';
import { AdzunaSource } from './adzuna';
import { RemoteOKSource } from './remoteok';
import { Config } from '../config';

export type { JobSource } from './base';
export { qualifyJobId, sourceTag } from './base';

/**
 * Creates the source adapters in search order.
 * Adapters without credentials stay in the list and return empty pages.
 */
export function createJobSources(config: Config): JobSource[] {
  return [
    new JSearchSource(config),
    new AdzunaSource(config),
    new RemoteOKSource(config),
  ];
}
