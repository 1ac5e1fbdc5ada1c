import { Response } from 'express';

export const SuccessResponse = <T>(
  res: Response,
  message: string,
  status = 200,
  data?: T
) => {
  return res.status(status).json({ success: true, message, data });
};
