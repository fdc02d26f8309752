import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { PasswordScheme } from '../config/index.js';
import { encodePassword } from '../services/passwordVerifier.js';
import type { ProductSeed, UserSeed } from '../store/types.js';

export interface SeedData {
  products: ProductSeed[];
  users: UserSeed[];
}

export const DEFAULT_SEED_FILE = new URL('../../data/seed.json', import.meta.url);

// Mirrors the bounds of productSchema and userSchema so a bad file fails before insertMany.
const productSeedSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  price: z.number().min(0),
  featured: z.boolean().default(false),
  description: z.string().optional(),
  stock: z.number().int().min(0).optional(),
  image: z.string().optional(),
  brand: z.string().optional(),
  rating: z.number().min(0).max(5).optional(),
  reviews: z.number().int().min(0).optional(),
});

const userSeedSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
  email: z.string().email().optional(),
  name: z.string().optional(),
});

const seedFileSchema = z.object({
  products: z.array(productSeedSchema).default([]),
  users: z.array(userSeedSchema).default([]),
});

export const parseSeedData = (raw: unknown): SeedData => {
  const parsed = seedFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid seed file: ${details}`);
  }
  return parsed.data;
};

export const readSeedFile = async (file: URL | string = DEFAULT_SEED_FILE): Promise<SeedData> => {
  const text = await readFile(file, 'utf8');
  return parseSeedData(JSON.parse(text));
};

// Seed passwords are plaintext on disk; store them the way the verifier expects.
export const encodeSeedPasswords = async (users: UserSeed[], scheme: PasswordScheme): Promise<UserSeed[]> =>
  Promise.all(users.map(async (user) => ({ ...user, password: await encodePassword(user.password, scheme) })));
