import mongoose, { Document, Schema, Types } from 'mongoose';
import bcrypt from 'bcryptjs';

// User roles in the system
export enum UserRole {
  ADMIN = 'admin',
  MEMBER = 'member',
}

export enum Permission {
  ADD_BOOK = 'add_book',
  CHANGE_BOOK = 'change_book',
  DELETE_BOOK = 'delete_book',
  VIEW_BOOK = 'view_book',
}

export const USERNAME_PATTERN = /^[\w.@+-]+$/;
export const USERNAME_MAX_LENGTH = 150;

export interface IUser extends Document<Types.ObjectId> {
  username: string;
  password?: string;
  role: UserRole;
  permissions: Permission[];
  isActive: boolean;
  lastLogin?: Date;
  createdAt: Date;
  comparePassword(candidatePassword: string): Promise<boolean>;
}

// What request handlers see of a user; never carries the password hash.
export interface AuthUser {
  id: string;
  username: string;
  role: UserRole;
  permissions: Permission[];
  isActive: boolean;
}

const UserSchema: Schema<IUser> = new Schema(
  {
    username: {
      type: String,
      required: [true, 'Username is required'],
      trim: true,
      maxlength: [USERNAME_MAX_LENGTH, 'Username cannot exceed 150 characters'],
      match: [
        USERNAME_PATTERN,
        'Username may contain only letters, numbers, and @/./+/-/_ characters',
      ],
    },
    password: {
      type: String,
      select: false,
    },
    role: {
      type: String,
      enum: Object.values(UserRole),
      default: UserRole.MEMBER,
    },
    permissions: [
      {
        type: String,
        enum: Object.values(Permission),
      },
    ],
    isActive: {
      type: Boolean,
      default: true,
    },
    lastLogin: {
      type: Date,
    },
    createdAt: {
      type: Date,
      default: Date.now,
    },
  },
  {
    timestamps: false,
  }
);

UserSchema.index({ username: 1 }, { unique: true });

UserSchema.pre<IUser>('save', async function (next) {
  if (this.password && this.isModified('password')) {
    const salt = await bcrypt.genSalt(10);
    this.password = await bcrypt.hash(this.password, salt);
  }
  next();
});

UserSchema.methods.comparePassword = async function (
  this: IUser,
  candidatePassword: string
): Promise<boolean> {
  if (!this.password) return false;
  return await bcrypt.compare(candidatePassword, this.password);
};

export const toAuthUser = (user: IUser): AuthUser => ({
  id: user._id.toHexString(),
  username: user.username,
  role: user.role,
  permissions: [...user.permissions],
  isActive: user.isActive,
});

// Inactive accounts hold no permissions; admins hold all of them.
export const hasPermission = (user: AuthUser, permission: Permission): boolean => {
  if (!user.isActive) return false;
  return user.role === UserRole.ADMIN || user.permissions.includes(permission);
};

export default mongoose.model<IUser>('User', UserSchema, 'Users');
