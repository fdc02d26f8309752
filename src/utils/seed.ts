import { loadConfig, loadEnvFile } from '../config/index.js';
import { connectDB, disconnectDB } from '../config/database.js';
import { createModels } from '../models/schema.js';
import { encodeSeedPasswords, readSeedFile } from './seedData.js';

// Replaces products and users in the configured Mongo database with data/seed.json.
const seedData = async () => {
  loadEnvFile();
  const config = loadConfig();
  console.log('🌱 Starting database seeding...');

  const seed = await readSeedFile();
  const connection = await connectDB(config);
  try {
    const { Product, User, CartItem } = createModels(connection);
    await CartItem.syncIndexes();

    await User.deleteMany({});
    await Product.deleteMany({});
    console.log('🗑️ Cleared existing data');

    const products = await Product.insertMany(seed.products);
    const users = await User.insertMany(await encodeSeedPasswords(seed.users, config.passwordScheme));

    console.log('✅ Database seeding completed successfully!');
    console.log(`- ${products.length} products (${seed.products.filter((p) => p.featured).length} featured)`);
    console.log(`- ${users.length} users, passwords stored as ${config.passwordScheme}`);
  } finally {
    await disconnectDB(connection);
  }
};

seedData().catch((error: unknown) => {
  console.error('❌ Seeding failed:', error);
  process.exit(1);
});
