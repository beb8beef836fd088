import mongoose from 'mongoose';
import dotenv from 'dotenv';
import path from 'path';
import MenuDay from '../models/MenuDay';
import Order from '../models/Order';
import Review from '../models/Review';

// Load env vars
const envPath = path.resolve(__dirname, '../../../.env');
console.log('Loading .env from:', envPath);
dotenv.config({ path: envPath });

// Uniqueness of menu days and orders rests on the unique indexes
// declared on these schemas.
const syncIndexes = async () => {
    try {
        if (!process.env.MONGO_URI) {
            throw new Error('MONGO_URI is not defined');
        }

        console.log('Connecting to MongoDB...');
        await mongoose.connect(process.env.MONGO_URI);
        console.log('Connected.');

        for (const model of [MenuDay, Order, Review]) {
            const dropped = await model.syncIndexes();
            console.log(`✅ ${model.collection.collectionName}: indexes in sync (dropped: ${dropped.length ? dropped.join(', ') : 'none'})`);
        }

        await mongoose.disconnect();
        process.exit(0);
    } catch (error) {
        console.error('Index sync failed:', error);
        process.exit(1);
    }
};

void syncIndexes();
