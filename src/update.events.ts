import { ApplicationConfig } from './config';

/** Numeric codes reported to the host alongside each error kind */
export const UpdateErrorCodes = {
  FailedToDownloadApplicationConfig: -1,
  NativeVersionTooLow: -2,
  FailedToDownloadContentManifest: -3,
  FailedToDownloadUpdateFiles: -4,
  LocalConfigNotFound: -9,
  LocalManifestNotFound: -10,
  UpdateInProgress: -14,
} as const;

export type UpdateErrorKind = keyof typeof UpdateErrorCodes;

export interface UpdateErrorEvent {
  type: 'Error';
  workerId: string;
  error: { kind: UpdateErrorKind; code: number };
  /** Remote config, when it was downloaded before the failure */
  config: ApplicationConfig | null;
}

export interface NothingToUpdateEvent {
  type: 'NothingToUpdate';
  workerId: string;
  config: ApplicationConfig;
}

export interface ReadyToInstallEvent {
  type: 'ReadyToInstall';
  workerId: string;
  config: ApplicationConfig;
}

/** Outcome of one update run, exactly one is produced per run */
export type UpdateEvent = UpdateErrorEvent | NothingToUpdateEvent | ReadyToInstallEvent;

export type UpdateEventSink = (event: UpdateEvent) => void;

export function updateError(workerId: string, kind: UpdateErrorKind, config: ApplicationConfig | null): UpdateErrorEvent {
  return { type: 'Error', workerId, error: { kind, code: UpdateErrorCodes[kind] }, config };
}

/** Supplies the build number of the native application shell */
export interface NativeVersionProvider {
  nativeBuildVersion(): number;
}
