import { FetcherConfig, FetcherDependencies } from './types'
import { BaseFetcher } from './baseFetcher'
import { BugswarmCliFetcher } from './bugswarmCliFetcher'
import { MetadataFetchConfig } from '../config'

export const fetcherRegistry: Record<
   MetadataFetchConfig['fetcherType'],
   (cfg: FetcherConfig, deps?: FetcherDependencies) => BaseFetcher
> = {
   'bugswarm-cli': (cfg, deps) => new BugswarmCliFetcher(cfg, deps),
}
