export interface NotificationDto {
  id: number;
  message: string;
  is_read: boolean;
  created_at: string;
  post_id: number;
}

export interface NotificationListResponse {
  notifications: NotificationDto[];
}
