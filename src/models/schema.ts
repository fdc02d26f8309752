import { Schema, Connection, Model, Types } from 'mongoose';

// Product Schema
export interface IProduct {
  _id: Types.ObjectId;
  name: string;
  description?: string;
  price: number;
  category: string;
  featured: boolean;
  stock: number;
  image?: string;
  brand: string;
  rating: number;
  reviews: number;
  createdAt: Date;
  updatedAt: Date;
}

const productSchema = new Schema<IProduct>({
  name: {
    type: String,
    required: true,
    trim: true,
  },
  description: {
    type: String,
    trim: true,
  },
  price: {
    type: Number,
    required: true,
    min: 0,
  },
  category: {
    type: String,
    required: true,
    trim: true,
  },
  featured: {
    type: Boolean,
    default: false,
  },
  stock: {
    type: Number,
    default: 0,
    min: 0,
  },
  image: {
    type: String,
    trim: true,
  },
  brand: {
    type: String,
    default: 'Generic',
    trim: true,
  },
  rating: {
    type: Number,
    default: 0,
    min: 0,
    max: 5,
  },
  reviews: {
    type: Number,
    default: 0,
    min: 0,
  },
}, {
  timestamps: true,
  collection: 'products',
});

// User Schema
export interface IUser {
  _id: Types.ObjectId;
  username: string;
  email?: string;
  name?: string;
  // plaintext or bcrypt hash, depending on PASSWORD_SCHEME
  password: string;
  createdAt: Date;
  updatedAt: Date;
}

const userSchema = new Schema<IUser>({
  username: {
    type: String,
    required: true,
    unique: true,
    trim: true,
  },
  email: {
    type: String,
    lowercase: true,
    trim: true,
  },
  name: {
    type: String,
    trim: true,
  },
  password: {
    type: String,
    required: true,
  },
}, {
  timestamps: true,
  collection: 'users',
});

// Cart Item Schema
export interface ICartItem {
  _id: Types.ObjectId;
  userId: string;
  productId: string;
  quantity: number;
  createdAt: Date;
  updatedAt: Date;
}

// userId and productId are free-form: nothing checks they reference existing documents.
const cartItemSchema = new Schema<ICartItem>({
  userId: {
    type: String,
    required: true,
  },
  productId: {
    type: String,
    required: true,
  },
  quantity: {
    type: Number,
    required: true,
    min: 1,
  },
}, {
  timestamps: true,
  collection: 'cart_items',
});

productSchema.index({ category: 1 });
productSchema.index({ featured: 1 });
userSchema.index({ email: 1 });
cartItemSchema.index({ userId: 1, productId: 1 }, { unique: true });

export interface Models {
  Product: Model<IProduct>;
  User: Model<IUser>;
  CartItem: Model<ICartItem>;
}

// Models are bound to the given connection rather than mongoose's default one.
export const createModels = (connection: Connection): Models => ({
  Product: connection.model<IProduct>('Product', productSchema),
  User: connection.model<IUser>('User', userSchema),
  CartItem: connection.model<ICartItem>('CartItem', cartItemSchema),
});
