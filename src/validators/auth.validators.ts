import { z } from 'zod';
import { USERNAME_MAX_LENGTH, USERNAME_PATTERN } from '../model/user.model';
import { REQUIRED_MESSAGE, maxLengthMessage } from '../Books/models/book.rules';
import { INVALID_VALUE_MESSAGE, blankToUndefined, fieldMessages } from './formFields';

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MISMATCH_MESSAGE = "The two password fields didn't match.";

const requiredString = () =>
  z.string({ errorMap: fieldMessages(REQUIRED_MESSAGE, INVALID_VALUE_MESSAGE) });

export const registerSchema = z
  .object({
    username: z.preprocess(
      blankToUndefined,
      requiredString()
        .trim()
        .max(USERNAME_MAX_LENGTH, maxLengthMessage(USERNAME_MAX_LENGTH))
        .regex(
          USERNAME_PATTERN,
          'Enter a valid username. This value may contain only letters, numbers, and @/./+/-/_ characters.'
        )
    ),
    password1: z.preprocess(
      blankToUndefined,
      requiredString()
        .min(
          PASSWORD_MIN_LENGTH,
          `This password is too short. It must contain at least ${PASSWORD_MIN_LENGTH} characters.`
        )
        .refine((value) => !/^\d+$/.test(value), 'This password is entirely numeric.')
    ),
    password2: z.preprocess(blankToUndefined, requiredString()),
  })
  .superRefine((data, ctx) => {
    if (data.password1 !== data.password2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password2'],
        message: PASSWORD_MISMATCH_MESSAGE,
      });
    }
  });

export const loginSchema = z.object({
  username: z.preprocess(blankToUndefined, requiredString().trim()),
  password: z.preprocess(blankToUndefined, requiredString()),
});

export type RegisterInput = z.output<typeof registerSchema>;
export type LoginInput = z.output<typeof loginSchema>;
