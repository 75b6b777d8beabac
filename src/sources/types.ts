import { Fragment, FragmentBackend, RemoteFileInfo } from "../types";

export interface CopyOptions {
  chunkSize: number;
  /** Parallel range requests, where the backend can split a transfer. */
  threads: number;
  knownSize?: number;
}

export interface FragmentSource {
  readonly backend: FragmentBackend;
  stat(fragment: Fragment): Promise<RemoteFileInfo>;
  /** Writes the whole fragment to `destination` and resolves to the number of bytes written. */
  copyTo(fragment: Fragment, destination: string, options: CopyOptions): Promise<number>;
  readRange(fragment: Fragment, offset: number, length: number): Promise<Buffer>;
}
