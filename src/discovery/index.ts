import { DiscoveryError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { ObjectStoreClient } from "../sources/objectStore";
import { Fragment } from "../types";
import { discoverS3Fragments, S3SourceDescriptor } from "./s3Discovery";
import {
  discoverWebPageFragments,
  discoverWebTemplateFragments,
  WebDiscoveryDeps,
  WebPageSourceDescriptor,
  WebTemplateSourceDescriptor,
} from "./webDiscovery";

export type SourceDescriptor = S3SourceDescriptor | WebPageSourceDescriptor | WebTemplateSourceDescriptor;

export interface DiscoveryDeps extends WebDiscoveryDeps {
  logger: Logger;
  metrics?: MetricsRegistry;
  objectStore?: ObjectStoreClient;
}

/**
 * Enumerates the fragments a source descriptor points at. Order is not guaranteed. Any
 * failure of the enumeration itself surfaces as a DiscoveryError.
 */
export async function discoverFragments(descriptor: SourceDescriptor, deps: DiscoveryDeps): Promise<Fragment[]> {
  const stopTimer = deps.metrics?.startTimer("discovery_ms");
  let fragments: Fragment[];

  try {
    switch (descriptor.kind) {
      case "s3":
        if (!deps.objectStore) {
          throw new DiscoveryError("s3 discovery needs an object store client");
        }
        fragments = await discoverS3Fragments(descriptor, { objectStore: deps.objectStore, logger: deps.logger });
        break;
      case "web_page":
        fragments = await discoverWebPageFragments(descriptor, deps);
        break;
      case "web_template":
        fragments = discoverWebTemplateFragments(descriptor);
        break;
      default:
        throw new DiscoveryError("Unsupported source descriptor");
    }
  } finally {
    stopTimer?.();
  }

  deps.metrics?.incrementCounter("fragments_discovered", fragments.length);
  deps.logger.info("discovery_complete", { kind: descriptor.kind, fragments: fragments.length });
  return fragments;
}

export * from "./fragment";
export * from "./s3Discovery";
export * from "./webDiscovery";
