/**
 * Identity Type Definitions
 */

export type IdentityRecord = {
    id: string;
    name?: string;
    email?: string;
};

/**
 * Identity records keyed by user identifier
 */
export type IdentityMapping = ReadonlyMap<string, IdentityRecord>;

export type IdentityLoadResult = {
    identities: IdentityMapping;
    note?: string;      // Informational, e.g. the file does not exist
    warning?: string;   // The file exists but could not be used
};

/**
 * Identity load result together with the file it came from, if any
 */
export type IdentitySource = IdentityLoadResult & {
    path?: string;
};
