import jwt, { SignOptions } from 'jsonwebtoken';
import { z } from 'zod';
import { env } from '../config/env';
import { PlayerInfo } from '../types/game';

const payloadSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
});

export function signToken(payload: PlayerInfo, expiresIn: SignOptions['expiresIn'] = '7d', secret: string = env.botToken) {
  return jwt.sign({ id: payload.id, username: payload.username }, secret, { expiresIn });
}

export function verifyToken(token: string, secret: string = env.botToken): PlayerInfo | null {
  try {
    const parsed = payloadSchema.safeParse(jwt.verify(token, secret));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
