// Narrow interfaces for the external collaborators the pipeline drives.
// Remote keys are absolute paths on the remote host.

export interface RemoteCallOptions {
  timeoutMs: number;
}

export interface TransferClient {
  /** Copy a local file to `remoteKey`, creating its parent directory. Throws TransferError. */
  upload(localPath: string, remoteKey: string, options: RemoteCallOptions): Promise<void>;
  /** Copy `remoteKey` to `localPath`, creating the local parent directory. Throws TransferError. */
  download(remoteKey: string, localPath: string, options: RemoteCallOptions): Promise<void>;
  /** Remove a remote file or directory tree. */
  remove(remoteKey: string, options: RemoteCallOptions): Promise<void>;
}

export interface ConvertRequest {
  /** Staged ebook on the remote host. */
  remoteKey: string;
  languageCode: string;
  /** Remote directory the converter writes into. */
  outputKey: string;
}

export interface RemoteExecutionClient {
  /** Run the TTS converter and return the key of the produced audio. Throws ConversionError. */
  convert(request: ConvertRequest, options: RemoteCallOptions): Promise<string>;
}

export interface EnsureReadyOptions {
  repo: string;
  branch: string;
  forceRebuild: boolean;
}

export interface RemoteEndpoint {
  /** `user@instance` */
  host: string;
  remoteHome: string;
  /** Root under which per-Job staging directories are created. */
  stagingRoot: string;
  image: string;
}

export interface EnvironmentProvider {
  /** Throws EnvironmentError when the host cannot be prepared. */
  ensureReady(options: EnsureReadyOptions): Promise<RemoteEndpoint>;
}

export interface CoverQuery {
  title: string;
  author?: string;
}

export interface CoverImage {
  data: Uint8Array;
  mimeType: 'image/jpeg' | 'image/png';
  sourceUrl?: string;
}

export interface MetadataProvider {
  /** Throws MetadataError when no cover can be found. */
  lookupCover(query: CoverQuery): Promise<CoverImage>;
}
