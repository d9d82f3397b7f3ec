export interface Notification {
  _id: number;
  userId: number;
  postId: number;
  message: string;
  isRead: boolean;
  createdAt: Date;
}
