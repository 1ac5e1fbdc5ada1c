import User, { toAuthUser } from '../model/user.model';
import type { AuthUser, Permission, UserRole } from '../model/user.model';

export interface NewUser {
  username: string;
  password: string;
  role?: UserRole;
  permissions?: Permission[];
}

export interface UserRepository {
  findById(id: string): Promise<AuthUser | null>;
  existsByUsername(username: string): Promise<boolean>;
  // Resolves to the user only when the password matches
  verifyCredentials(username: string, password: string): Promise<AuthUser | null>;
  create(input: NewUser): Promise<AuthUser>;
  recordLogin(id: string): Promise<void>;
}

export class MongoUserRepository implements UserRepository {
  async findById(id: string): Promise<AuthUser | null> {
    const user = await User.findById(id);
    return user ? toAuthUser(user) : null;
  }

  async existsByUsername(username: string): Promise<boolean> {
    const existing = await User.exists({ username });
    return existing !== null;
  }

  async verifyCredentials(username: string, password: string): Promise<AuthUser | null> {
    const user = await User.findOne({ username }).select('+password');
    if (!user) return null;

    const isPasswordCorrect = await user.comparePassword(password);
    return isPasswordCorrect ? toAuthUser(user) : null;
  }

  async create(input: NewUser): Promise<AuthUser> {
    // The password is hashed by the schema's pre-save hook
    const user = await User.create(input);
    return toAuthUser(user);
  }

  async recordLogin(id: string): Promise<void> {
    await User.updateOne({ _id: id }, { $set: { lastLogin: new Date() } });
  }
}
