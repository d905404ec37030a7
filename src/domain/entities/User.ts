export interface User {
  id: number;
  username: string;
  passwordHash: string;
}

export interface AuthenticatedUser {
  userId: number;
  username: string;
}
