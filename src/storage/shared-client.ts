import { ClientClosedError } from '../errors'
import type { DocumentStore } from './types'

/**
 * Reference-counted handle on a document store shared by a vector store and
 * its collections.
 *
 * An owned store is closed exactly once, when the last reference is
 * released. A borrowed store (supplied by the caller) is never closed here.
 */
export class SharedClient {
  private references = 0
  private closed = false

  constructor(
    private readonly store: DocumentStore,
    readonly owned: boolean
  ) {}

  get referenceCount(): number {
    return this.references
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Take a reference; pair every call with one `release`
   */
  acquire(): DocumentStore {
    if (this.closed) {
      throw new ClientClosedError()
    }
    this.references++
    return this.store
  }

  async release(): Promise<void> {
    if (this.references === 0) {
      return
    }
    this.references--
    if (this.references === 0 && this.owned && !this.closed) {
      this.closed = true
      await this.store.close()
    }
  }
}
