import { Types } from 'mongoose';
import type {
  AddToCartInput,
  AddToCartResult,
  CartItemDto,
  MobileStore,
  ProductDto,
  ProductSeed,
  UserRecord,
  UserSeed,
} from './types.js';

export interface MemoryStoreSeed {
  products?: ProductSeed[];
  users?: UserSeed[];
}

const newId = (): string => new Types.ObjectId().toHexString();

const toProduct = (seed: ProductSeed, now: string): ProductDto => ({
  id: newId(),
  name: seed.name,
  category: seed.category,
  price: seed.price,
  featured: seed.featured ?? false,
  description: seed.description,
  stock: seed.stock ?? 0,
  image: seed.image,
  brand: seed.brand ?? 'Generic',
  rating: seed.rating ?? 0,
  reviews: seed.reviews ?? 0,
  createdAt: now,
  updatedAt: now,
});

/**
 * In-process store with the same semantics as the Mongo one: insertion order,
 * one cart line per (user, product), email lookups case-insensitive.
 * Used by the tests and by `STORE_DRIVER=memory`.
 */
export class MemoryStore implements MobileStore {
  private readonly productRows: ProductDto[];
  private readonly userRows: UserRecord[];
  private readonly cartRows: CartItemDto[] = [];

  constructor(seed: MemoryStoreSeed = {}) {
    const now = new Date().toISOString();
    this.productRows = (seed.products ?? []).map((product) => toProduct(product, now));
    this.userRows = (seed.users ?? []).map((user) => ({
      id: newId(),
      username: user.username,
      email: user.email?.toLowerCase(),
      name: user.name,
      password: user.password,
    }));
  }

  readonly products = {
    list: async (category?: string): Promise<ProductDto[]> =>
      this.productRows.filter((product) => !category || product.category === category).map((product) => ({ ...product })),

    listFeatured: async (): Promise<ProductDto[]> =>
      this.productRows.filter((product) => product.featured).map((product) => ({ ...product })),

    findById: async (id: string): Promise<ProductDto | null> => {
      const product = this.productRows.find((row) => row.id === id);
      return product ? { ...product } : null;
    },
  };

  readonly users = {
    findByLogin: async (login: string): Promise<UserRecord | null> => {
      const email = login.toLowerCase();
      const user =
        this.userRows.find((row) => row.username === login) ??
        this.userRows.find((row) => row.email === email);
      return user ? { ...user } : null;
    },
  };

  readonly cart = {
    addItem: async ({ userId, productId, quantity }: AddToCartInput): Promise<AddToCartResult> => {
      const now = new Date().toISOString();
      const existing = this.cartRows.find((row) => row.user_id === userId && row.product_id === productId);
      if (existing) {
        existing.quantity += quantity;
        existing.updatedAt = now;
        return { item: { ...existing }, created: false };
      }

      const item: CartItemDto = {
        id: newId(),
        user_id: userId,
        product_id: productId,
        quantity,
        createdAt: now,
        updatedAt: now,
      };
      this.cartRows.push(item);
      return { item: { ...item }, created: true };
    },

    listForUser: async (userId: string): Promise<CartItemDto[]> =>
      this.cartRows.filter((row) => row.user_id === userId).map((row) => ({ ...row })),
  };
}
