import type {
  CredentialChange,
  CredentialRecord,
  OAuthProviderName,
} from './types/credential.ts'

/**
 * Narrow read/write contract over the backing credential table.
 * Every email argument is matched case-insensitively.
 */
export interface CredentialStore {
  findById(id: string): Promise<CredentialRecord | null>
  /** Lookup by the identifier a user types on the login form (their email). */
  findByIdentifier(identifier: string): Promise<CredentialRecord | null>
  findByEmail(email: string): Promise<CredentialRecord | null>
  findByProviderSubject(
    provider: OAuthProviderName,
    oauthId: string,
  ): Promise<CredentialRecord | null>
  /** Returns false when a record with the same email already exists. */
  insert(record: CredentialRecord): Promise<boolean>
  /**
   * Applies the change and returns the updated record, or null when no record
   * matches or the change does not apply to the record's current provider.
   */
  update(email: string, change: CredentialChange): Promise<CredentialRecord | null>
  /**
   * Rewrite the id and provider lookups for a record whose primary row is
   * already stored, after an index write was lost or has not landed yet.
   */
  reindex(record: CredentialRecord): Promise<void>
  count(): Promise<number>
}
