import { User } from '../entities/User';

export interface IUserRepository {
  // Returns null when the username is already taken
  createUser(username: string, passwordHash: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findById(userId: number): Promise<User | null>;
  // Removes the user, their habits and every completion of those habits
  deleteUser(userId: number): Promise<boolean>;
}
