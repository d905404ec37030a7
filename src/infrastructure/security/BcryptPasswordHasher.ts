import bcrypt from 'bcryptjs';
import { IPasswordHasher } from '../../domain/services/IPasswordHasher';

export class BcryptPasswordHasher implements IPasswordHasher {
  constructor(private rounds: number = 10) {}

  hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  verify(password: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(password, passwordHash);
  }
}
