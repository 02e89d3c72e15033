import * as path from "node:path";

/**
 * Locations of every file the onboarding core reads or writes.
 */
export interface TernPaths {
  /** Root directory (default ~/.tern) */
  readonly home: string;
  /** Canonical NAME=value credential document */
  readonly credentialFile: string;
  /** Persisted wizard progress */
  readonly stateFile: string;
  /** Setup configuration read by the rest of the application */
  readonly configFile: string;
  /** Zero-byte sentinel meaning setup need not run again */
  readonly markerFile: string;
  /** Encrypted secondary credential store */
  readonly secondaryStoreFile: string;
}

export function resolveTernPaths(home: string): TernPaths {
  return {
    home,
    credentialFile: path.join(home, ".env"),
    stateFile: path.join(home, "wizard_state.json"),
    configFile: path.join(home, "config.json"),
    markerFile: path.join(home, ".setup_complete"),
    secondaryStoreFile: path.join(home, "credentials.enc"),
  };
}
