import { describeError, DiscoveryError } from "../core/errors";
import { Logger } from "../observability";
import { ObjectListingPage, ObjectStoreClient } from "../sources/objectStore";
import { Fragment } from "../types";
import { createFragment, fileExtension, fragmentBasename } from "./fragment";

export interface S3SourceDescriptor {
  kind: "s3";
  bucket: string;
  prefix: string;
  format: string;
}

export interface S3DiscoveryDeps {
  objectStore: ObjectStoreClient;
  logger: Logger;
}

function isDataKey(key: string, format: string): boolean {
  if (key.endsWith("/")) {
    return false;
  }
  const name = fragmentBasename(key);
  if (!name || name.startsWith(".") || name.startsWith("_")) {
    return false;
  }
  return fileExtension(name) === format;
}

/**
 * Lists every object under the prefix, following continuation tokens. Hive-style
 * `key=value` directories are kept on each fragment as partitions.
 */
export async function discoverS3Fragments(descriptor: S3SourceDescriptor, deps: S3DiscoveryDeps): Promise<Fragment[]> {
  const format = descriptor.format.toLowerCase();
  const fragments: Fragment[] = [];
  let continuationToken: string | undefined;
  let pages = 0;
  let listed = 0;

  do {
    let page: ObjectListingPage;
    try {
      page = await deps.objectStore.listObjects(descriptor.bucket, descriptor.prefix, continuationToken);
    } catch (error) {
      throw new DiscoveryError(
        `Failed to list s3://${descriptor.bucket}/${descriptor.prefix}: ${describeError(error)}`,
        { cause: error },
      );
    }

    pages += 1;
    listed += page.objects.length;
    for (const object of page.objects) {
      if (!isDataKey(object.key, format)) {
        continue;
      }
      fragments.push(
        createFragment(object.key, "s3", {
          size: object.size,
          modifiedAt: object.lastModified,
          etag: object.etag,
        }),
      );
    }

    if (page.nextToken !== undefined && page.nextToken === continuationToken) {
      throw new DiscoveryError(`Listing of s3://${descriptor.bucket}/${descriptor.prefix} repeated a continuation token`);
    }
    continuationToken = page.nextToken;
  } while (continuationToken);

  deps.logger.info("discovery_s3_listed", {
    bucket: descriptor.bucket,
    prefix: descriptor.prefix,
    pages,
    listed,
    fragments: fragments.length,
  });
  return fragments;
}
