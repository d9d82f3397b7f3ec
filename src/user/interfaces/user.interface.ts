export interface User {
  _id: number;
  username: string;
  email: string;
  passwordHash: string;
  createdAt: Date;
}

/** Public JSON shape of a user; never carries the password hash. */
export interface UserSummary {
  id: number;
  username: string;
  email: string;
  created_at: string;
}

export interface UserListResponse {
  users: UserSummary[];
}
