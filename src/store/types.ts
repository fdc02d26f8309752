export interface ProductDto {
  id: string;
  name: string;
  category: string;
  price: number;
  featured: boolean;
  description?: string;
  stock: number;
  image?: string;
  brand: string;
  rating: number;
  reviews: number;
  createdAt?: string;
  updatedAt?: string;
}

// Internal user record, password included. Never serialized as-is.
export interface UserRecord {
  id: string;
  username: string;
  email?: string;
  name?: string;
  password: string;
}

export interface UserSummary {
  id: string;
  username: string;
  email?: string;
  name?: string;
}

export interface CartItemDto {
  id: string;
  user_id: string;
  product_id: string;
  quantity: number;
  createdAt?: string;
  updatedAt?: string;
}

export interface AddToCartInput {
  userId: string;
  productId: string;
  quantity: number;
}

export interface AddToCartResult {
  item: CartItemDto;
  created: boolean;
}

export interface ProductStore {
  /** Products in insertion order, optionally restricted to one category. */
  list(category?: string): Promise<ProductDto[]>;
  listFeatured(): Promise<ProductDto[]>;
  findById(id: string): Promise<ProductDto | null>;
}

export interface UserStore {
  /** Looks a user up by username, then by email (case-insensitive). */
  findByLogin(login: string): Promise<UserRecord | null>;
}

export interface CartStore {
  /**
   * Adds `quantity` to the (user, product) line, creating it when absent.
   * Lines are never duplicated.
   */
  addItem(input: AddToCartInput): Promise<AddToCartResult>;
  listForUser(userId: string): Promise<CartItemDto[]>;
}

export interface MobileStore {
  products: ProductStore;
  users: UserStore;
  cart: CartStore;
}

export interface ProductSeed {
  name: string;
  category: string;
  price: number;
  featured?: boolean;
  description?: string;
  stock?: number;
  image?: string;
  brand?: string;
  rating?: number;
  reviews?: number;
}

export interface UserSeed {
  username: string;
  password: string;
  email?: string;
  name?: string;
}
