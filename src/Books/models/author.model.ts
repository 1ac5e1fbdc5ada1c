import mongoose, { Document, Schema, Types } from 'mongoose';
import { REQUIRED_MESSAGE, maxLengthMessage } from './book.rules';

export const AUTHOR_NAME_MAX_LENGTH = 100;

export interface IAuthor extends Document<Types.ObjectId> {
  name: string;
  lastName: string;
}

const AuthorSchema: Schema<IAuthor> = new Schema({
  name: {
    type: String,
    required: [true, REQUIRED_MESSAGE],
    trim: true,
    maxlength: [AUTHOR_NAME_MAX_LENGTH, maxLengthMessage(AUTHOR_NAME_MAX_LENGTH)],
  },
  lastName: {
    type: String,
    required: [true, REQUIRED_MESSAGE],
    trim: true,
    maxlength: [AUTHOR_NAME_MAX_LENGTH, maxLengthMessage(AUTHOR_NAME_MAX_LENGTH)],
  },
});

AuthorSchema.index({ lastName: 1, name: 1 });

export default mongoose.model<IAuthor>('Author', AuthorSchema, 'Authors');
