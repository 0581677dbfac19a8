/**
 * Response schemas for the XRPC endpoints the client calls.
 */

import { z } from 'zod';

const token = z.string().min(1);

export const createSessionResponseSchema = z.object({
  accessJwt: token,
  refreshJwt: token,
  did: z.string().min(1),
  handle: z.string().optional(),
});

export const refreshSessionResponseSchema = z.object({
  accessJwt: token,
  refreshJwt: token,
  did: z.string().optional(),
  handle: z.string().optional(),
});

export const createRecordResponseSchema = z.object({
  uri: z.string().min(1),
  cid: z.string().min(1),
});

export const storedSessionSchema = z.object({
  accessToken: token,
  refreshToken: token,
  handle: z.string(),
  subjectId: z.string().min(1),
});
