import { Connection, mongo } from 'mongoose';
import { createModels, ICartItem, IProduct, IUser, Models } from '../models/schema.js';
import { StoreError } from '../errors/StoreError.js';
import type {
  AddToCartInput,
  AddToCartResult,
  CartItemDto,
  CartStore,
  MobileStore,
  ProductDto,
  ProductStore,
  UserRecord,
  UserStore,
} from './types.js';

const OBJECT_ID_PATTERN = /^[a-f\d]{24}$/i;

export const toProductDto = (p: IProduct): ProductDto => ({
  id: String(p._id),
  name: p.name,
  category: p.category,
  price: p.price,
  featured: !!p.featured,
  description: p.description,
  stock: p.stock ?? 0,
  image: p.image,
  brand: p.brand ?? 'Generic',
  rating: p.rating ?? 0,
  reviews: p.reviews ?? 0,
  createdAt: p.createdAt?.toISOString(),
  updatedAt: p.updatedAt?.toISOString(),
});

export const toCartItemDto = (item: ICartItem): CartItemDto => ({
  id: String(item._id),
  user_id: item.userId,
  product_id: item.productId,
  quantity: item.quantity,
  createdAt: item.createdAt?.toISOString(),
  updatedAt: item.updatedAt?.toISOString(),
});

export const toUserRecord = (u: IUser): UserRecord => ({
  id: String(u._id),
  username: u.username,
  email: u.email,
  name: u.name,
  password: u.password,
});

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongo.MongoServerError && error.code === 11000;

// Every driver failure leaves the store as a StoreError.
const run = async <T>(operation: string, fn: () => Promise<T>): Promise<T> => {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }
    throw new StoreError(`Store operation failed: ${operation}`, error);
  }
};

class MongoProductStore implements ProductStore {
  constructor(private readonly models: Models) {}

  list(category?: string): Promise<ProductDto[]> {
    return run('products.list', async () => {
      const filter = category ? { category } : {};
      const products = await this.models.Product.find(filter).lean<IProduct[]>();
      return products.map(toProductDto);
    });
  }

  listFeatured(): Promise<ProductDto[]> {
    return run('products.listFeatured', async () => {
      const products = await this.models.Product.find({ featured: true }).lean<IProduct[]>();
      return products.map(toProductDto);
    });
  }

  findById(id: string): Promise<ProductDto | null> {
    // A malformed id cannot match anything; skip the CastError round-trip
    if (!OBJECT_ID_PATTERN.test(id)) {
      return Promise.resolve(null);
    }
    return run('products.findById', async () => {
      const product = await this.models.Product.findById(id).lean<IProduct | null>();
      return product ? toProductDto(product) : null;
    });
  }
}

class MongoUserStore implements UserStore {
  constructor(private readonly models: Models) {}

  // A username match wins over another account whose email equals the same string
  findByLogin(login: string): Promise<UserRecord | null> {
    return run('users.findByLogin', async () => {
      const user =
        (await this.models.User.findOne({ username: login }).lean<IUser | null>()) ??
        (await this.models.User.findOne({ email: login.toLowerCase() }).lean<IUser | null>());
      return user ? toUserRecord(user) : null;
    });
  }
}

class MongoCartStore implements CartStore {
  constructor(private readonly models: Models) {}

  addItem(input: AddToCartInput): Promise<AddToCartResult> {
    return run('cart.addItem', async () => {
      try {
        return await this.upsert(input);
      } catch (error) {
        // Two concurrent first inserts for the same line: the loser retries as an increment
        if (isDuplicateKeyError(error)) {
          return await this.upsert(input);
        }
        throw error;
      }
    });
  }

  listForUser(userId: string): Promise<CartItemDto[]> {
    return run('cart.listForUser', async () => {
      const items = await this.models.CartItem.find({ userId }).lean<ICartItem[]>();
      return items.map(toCartItemDto);
    });
  }

  private async upsert({ userId, productId, quantity }: AddToCartInput): Promise<AddToCartResult> {
    const result = await this.models.CartItem.findOneAndUpdate(
      { userId, productId },
      { $inc: { quantity } },
      { upsert: true, new: true, setDefaultsOnInsert: true, includeResultMetadata: true, lean: true },
    );
    if (!result.value) {
      throw new StoreError('Cart upsert returned no document');
    }
    return {
      item: toCartItemDto(result.value),
      created: result.lastErrorObject?.updatedExisting !== true,
    };
  }
}

export const createMongoStore = (connection: Connection): MobileStore => {
  const models = createModels(connection);
  return {
    products: new MongoProductStore(models),
    users: new MongoUserStore(models),
    cart: new MongoCartStore(models),
  };
};
