import { describe, it, expect, vi, afterEach } from 'vitest';
import mongoose, { Query, Types, mongo } from 'mongoose';
import { StoreError } from '../errors/StoreError.js';
import { createMongoStore, toCartItemDto, toProductDto, toUserRecord } from './mongoStore.js';

const id = new Types.ObjectId('65f1a2b3c4d5e6f7a8b9c0d1');
const createdAt = new Date('2024-03-01T10:00:00.000Z');
const updatedAt = new Date('2024-03-02T12:30:00.000Z');

describe('toProductDto', () => {
  it('exposes _id as a string id and dates as ISO strings', () => {
    const dto = toProductDto({
      _id: id,
      name: 'Laptop',
      category: 'Electronics',
      price: 999.5,
      featured: true,
      stock: 3,
      brand: 'ProBook',
      rating: 4.5,
      reviews: 10,
      createdAt,
      updatedAt,
    });

    expect(dto).toEqual({
      id: '65f1a2b3c4d5e6f7a8b9c0d1',
      name: 'Laptop',
      category: 'Electronics',
      price: 999.5,
      featured: true,
      description: undefined,
      stock: 3,
      image: undefined,
      brand: 'ProBook',
      rating: 4.5,
      reviews: 10,
      createdAt: '2024-03-01T10:00:00.000Z',
      updatedAt: '2024-03-02T12:30:00.000Z',
    });
  });
});

describe('toCartItemDto', () => {
  it('renames fields to the wire format', () => {
    expect(toCartItemDto({ _id: id, userId: 'u1', productId: 'p1', quantity: 5, createdAt, updatedAt })).toEqual({
      id: '65f1a2b3c4d5e6f7a8b9c0d1',
      user_id: 'u1',
      product_id: 'p1',
      quantity: 5,
      createdAt: '2024-03-01T10:00:00.000Z',
      updatedAt: '2024-03-02T12:30:00.000Z',
    });
  });
});

describe('toUserRecord', () => {
  it('keeps the stored password for verification', () => {
    const record = toUserRecord({
      _id: id,
      username: 'demo',
      email: 'demo@example.com',
      password: 'test-password',
      createdAt,
      updatedAt,
    });

    expect(record).toEqual({
      id: '65f1a2b3c4d5e6f7a8b9c0d1',
      username: 'demo',
      email: 'demo@example.com',
      name: undefined,
      password: 'test-password',
    });
  });
});

// Models bound to a connection that never opens; query execution is stubbed per test.
const store = createMongoStore(mongoose.createConnection());

const stubExec = () => vi.spyOn(Query.prototype, 'exec');

const executedQuery = (exec: ReturnType<typeof stubExec>, index: number) => {
  const query = exec.mock.contexts[index];
  if (!(query instanceof Query)) {
    throw new Error(`exec call #${index} did not run on a query`);
  }
  return query;
};

const cartDoc = (quantity: number) => ({ _id: id, userId: 'u1', productId: 'p1', quantity, createdAt, updatedAt });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Mongo product store', () => {
  const laptop = { _id: id, name: 'Laptop', category: 'Electronics', price: 999, featured: true, createdAt, updatedAt };

  it('lists featured products with a featured filter', async () => {
    const exec = stubExec().mockResolvedValueOnce([laptop]);

    const products = await store.products.listFeatured();

    expect(executedQuery(exec, 0).getFilter()).toEqual({ featured: true });
    expect(products.map((p) => p.name)).toEqual(['Laptop']);
  });

  it('filters by category only when one is given', async () => {
    const exec = stubExec().mockResolvedValue([]);

    await store.products.list('Accessories');
    await store.products.list();

    expect(executedQuery(exec, 0).getFilter()).toEqual({ category: 'Accessories' });
    expect(executedQuery(exec, 1).getFilter()).toEqual({});
  });

  it('answers null for a malformed id without querying', async () => {
    const exec = stubExec();

    await expect(store.products.findById('not-an-id')).resolves.toBeNull();
    expect(exec).not.toHaveBeenCalled();
  });

  it('wraps driver failures in StoreError', async () => {
    const failure = new Error('connection refused');
    stubExec().mockRejectedValueOnce(failure);

    const listing = store.products.list();

    await expect(listing).rejects.toBeInstanceOf(StoreError);
    await expect(listing).rejects.toThrow('Store operation failed: products.list');
    await expect(listing).rejects.toHaveProperty('cause', failure);
  });
});

describe('Mongo user store', () => {
  const user = { _id: id, username: 'demo', email: 'demo@example.com', password: 'test-password', createdAt, updatedAt };

  it('looks the login up as a username first', async () => {
    const exec = stubExec().mockResolvedValueOnce(user);

    await expect(store.users.findByLogin('demo')).resolves.toMatchObject({ username: 'demo' });
    expect(exec).toHaveBeenCalledTimes(1);
    expect(executedQuery(exec, 0).getFilter()).toEqual({ username: 'demo' });
  });

  it('falls back to the lowercased email when no username matches', async () => {
    const exec = stubExec().mockResolvedValueOnce(null).mockResolvedValueOnce(user);

    await expect(store.users.findByLogin('Demo@Example.com')).resolves.toMatchObject({ username: 'demo' });
    expect(executedQuery(exec, 0).getFilter()).toEqual({ username: 'Demo@Example.com' });
    expect(executedQuery(exec, 1).getFilter()).toEqual({ email: 'demo@example.com' });
  });

  it('returns null when neither lookup matches', async () => {
    stubExec().mockResolvedValue(null);

    await expect(store.users.findByLogin('nobody')).resolves.toBeNull();
  });
});

describe('Mongo cart store', () => {
  const input = { userId: 'u1', productId: 'p1', quantity: 2 };

  it('increments the (user, product) line in one upsert', async () => {
    const exec = stubExec().mockResolvedValueOnce({ value: cartDoc(2), lastErrorObject: { updatedExisting: false } });

    const result = await store.cart.addItem(input);

    const query = executedQuery(exec, 0);
    expect(query.getFilter()).toEqual({ userId: 'u1', productId: 'p1' });
    expect(query.getUpdate()).toEqual({ $inc: { quantity: 2 } });
    expect(query.getOptions()).toMatchObject({ upsert: true });
    expect(result).toEqual({ item: toCartItemDto(cartDoc(2)), created: true });
  });

  it('reports a merge when the line already existed', async () => {
    stubExec().mockResolvedValueOnce({ value: cartDoc(5), lastErrorObject: { updatedExisting: true } });

    const result = await store.cart.addItem({ ...input, quantity: 3 });

    expect(result.created).toBe(false);
    expect(result.item.quantity).toBe(5);
  });

  it('retries once as an increment after a duplicate-key race', async () => {
    const exec = stubExec()
      .mockRejectedValueOnce(new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }))
      .mockResolvedValueOnce({ value: cartDoc(4), lastErrorObject: { updatedExisting: true } });

    const result = await store.cart.addItem(input);

    expect(exec).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ item: toCartItemDto(cartDoc(4)), created: false });
  });

  it('gives up after a second duplicate-key error', async () => {
    const duplicate = new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 });
    const exec = stubExec().mockRejectedValue(duplicate);

    const adding = store.cart.addItem(input);

    await expect(adding).rejects.toThrow('Store operation failed: cart.addItem');
    await expect(adding).rejects.toHaveProperty('cause', duplicate);
    expect(exec).toHaveBeenCalledTimes(2);
  });

  it('does not retry other driver errors', async () => {
    const exec = stubExec().mockRejectedValueOnce(new mongo.MongoServerError({ message: 'not primary', code: 10107 }));

    await expect(store.cart.addItem(input)).rejects.toBeInstanceOf(StoreError);
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it('fails when the upsert hands back no document', async () => {
    stubExec().mockResolvedValueOnce({ value: null, lastErrorObject: { updatedExisting: false } });

    await expect(store.cart.addItem(input)).rejects.toThrow(new StoreError('Cart upsert returned no document'));
  });

  it('lists one user\'s lines', async () => {
    const exec = stubExec().mockResolvedValueOnce([cartDoc(5)]);

    await expect(store.cart.listForUser('u1')).resolves.toEqual([toCartItemDto(cartDoc(5))]);
    expect(executedQuery(exec, 0).getFilter()).toEqual({ userId: 'u1' });
  });
});
