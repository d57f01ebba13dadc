import type { ThreadMessage, ThreadMetadata, ThreadSummary } from '../../core/entities/Thread.js';
import type { ICortexClient, RemoteThread } from '../../core/interfaces/ICortexClient.js';
import type { IThreadStore } from '../../core/interfaces/IThreadStore.js';

/**
 * Service for managing agent threads: remote CRUD through the Cortex Threads
 * API, mirrored into the local store
 */
export class ThreadService {
  constructor(
    private client: ICortexClient,
    private store: IThreadStore,
    private originApplication: string,
    private debugLog: (message: string) => void = () => {}
  ) {}

  async createThread(threadName?: string): Promise<ThreadMetadata> {
    const threadId = await this.client.createThread(this.originApplication);
    if (threadName) {
      await this.client.renameThread(threadId, threadName);
    }

    const now = Date.now();
    const thread: ThreadMetadata = {
      threadId,
      threadName: threadName ?? '',
      originApplication: this.originApplication,
      createdOn: now,
      updatedOn: now,
    };
    this.store.saveThread(thread);
    this.debugLog(`[ThreadService] Created thread ${threadId}`);
    return thread;
  }

  /**
   * Refresh the local cache from the remote thread list, then list the cache.
   * When the remote call fails the cached list is returned as is.
   */
  async listThreads(): Promise<ThreadSummary[]> {
    try {
      const remote = await this.client.listThreads(this.originApplication);
      for (const thread of remote) {
        this.store.saveThread(thread);
      }
      this.debugLog(`[ThreadService] Synced ${remote.length} remote thread(s)`);
    } catch (error) {
      console.error(
        '[ThreadService] Could not list remote threads, using local cache:',
        error instanceof Error ? error.message : error
      );
    }
    return this.store.listThreads();
  }

  getThread(threadId: string): ThreadMetadata | null {
    return this.store.getThread(threadId);
  }

  async renameThread(threadId: string, threadName: string): Promise<void> {
    await this.client.renameThread(threadId, threadName);
    this.store.renameThread(threadId, threadName);
  }

  async deleteThread(threadId: string): Promise<void> {
    await this.client.deleteThread(threadId);
    this.store.deleteThread(threadId);
    this.debugLog(`[ThreadService] Deleted thread ${threadId}`);
  }

  getMessages(threadId: string): ThreadMessage[] {
    return this.store.listMessages(threadId);
  }

  /**
   * Messages as the vendor stores them, newest first
   */
  async getRemoteThread(threadId: string, pageSize?: number, lastMessageId?: number): Promise<RemoteThread> {
    return this.client.getThread(threadId, pageSize, lastMessageId);
  }
}
