import { Router } from 'express';
import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import { signToken } from '../lib/jwt';

const router = Router();

const guestSchema = z.object({
  username: z.string().min(3).max(30).regex(/^[a-zA-Z0-9_]+$/),
});

// Issues a player token for the chat socket handshake.
router.post('/auth/guest', (req, res) => {
  const parsed = guestSchema.safeParse(req.body);
  if (!parsed.success) return res.status(400).json({ error: 'invalid_input', details: parsed.error.issues });
  const user = { id: uuid(), username: parsed.data.username };
  const token = signToken(user);
  return res.json({ token, user });
});

export default router;
