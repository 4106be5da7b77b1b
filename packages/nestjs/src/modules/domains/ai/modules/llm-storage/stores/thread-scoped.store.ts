import type { DocumentStorePort } from "../ports/document-store.port";
import { THREAD_ID_FIELD } from "../schemas/checkpoints.interface";

/**
 * Base for the checkpoint collections, all of which carry a `thread_id` field.
 */
export abstract class ThreadScopedStore {
  constructor(
    protected readonly store: DocumentStorePort,
    protected readonly collection: string,
  ) {}

  async listForThread(threadId: string): Promise<string[]> {
    const documents = await this.store.query(this.collection, {
      where: { [THREAD_ID_FIELD]: threadId },
    });
    return documents.map((document) => document.id);
  }

  /**
   * Deletes every document of the thread, one request per document.
   * Returns the number of documents removed.
   */
  async deleteThread(threadId: string): Promise<number> {
    const ids = await this.listForThread(threadId);
    await Promise.all(ids.map((id) => this.store.delete(this.collection, id)));
    return ids.length;
  }
}
