export type Priority = 1 | 2 | 3 | 4 | 5;

export type FeedSource = {
  readonly name: string;
  readonly url: string;
  readonly priority: Priority;
  readonly icon?: string;
  readonly tags?: ReadonlyArray<string>;
};

export type FeedGroup = {
  readonly topic: string;
  readonly sources: ReadonlyArray<FeedSource>;
};

export type Entry = {
  readonly identity: string;
  readonly title: string | null;
  readonly link: string;
  readonly publishedAt: Date | null;
  readonly rawContent: string;
  readonly mediaUrl: string | null;
};

export type NotificationPayload = {
  readonly topic: string;
  readonly title: string;
  readonly message: string;
  readonly priority: Priority;
  readonly tags: ReadonlyArray<string>;
  readonly icon: string | null;
  readonly attachment: string | null;
  readonly clickUrl: string | null;
  /** Entry publish time as local wall-clock text, `YYYY-MM-DD HH:mm:ss`. */
  readonly publishedAt: string | null;
  readonly markdown: boolean;
};

export type DedupResult = {
  readonly unseen: ReadonlyArray<Entry>;
  readonly skippedCount: number;
};

export type SourceReport = {
  readonly feedName: string;
  readonly url: string;
  readonly fetched: number;
  readonly unseen: number;
  readonly dispatched: number;
  readonly failed: number;
  readonly skipped: number;
  readonly deferred: number;
  readonly error: string | null;
};

export type GroupReport = {
  readonly topic: string;
  readonly sources: ReadonlyArray<SourceReport>;
};

export type SyncStatus = "completed" | "aborted" | "cancelled";

export type SyncReport = {
  readonly status: SyncStatus;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly error: string | null;
  readonly groups: ReadonlyArray<GroupReport>;
};
