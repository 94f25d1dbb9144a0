/** The provider's current view of one address record */
export interface RemoteRecord {
  id: string;
  address: string;
}

/** Minimal interface for a DNS provider adapter (read one record, replace its content) */
export interface RecordProvider {
  /**
   * Look up the address record for a hostname.
   * Rejects with `RecordNotFoundError` when nothing matches, `ProviderError` otherwise.
   * When several records match, the first one the provider returns wins.
   */
  fetchRecord(hostname: string): Promise<RemoteRecord>;
  /** Replace the content of a record by provider ID */
  updateRecord(recordId: string, hostname: string, address: string): Promise<void>;
}
