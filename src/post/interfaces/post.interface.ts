export interface Post {
  _id: number;
  title: string;
  content: string;
  userId: number;
  /** True until the notification batch of an API-created post is committed. */
  fanOutPending: boolean;
  createdAt: Date;
}

export interface PostSummary {
  id: number;
  title: string;
  content: string;
  author: string;
  created_at: string;
}

export interface PostListResponse {
  posts: PostSummary[];
}

export interface PostCreatedResponse {
  message: string;
  post: PostSummary;
}

export interface FanOutReconcileResult {
  posts: number;
  notified: number;
}
