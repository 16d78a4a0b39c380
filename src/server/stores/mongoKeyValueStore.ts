// =============================================================================
// MongoKeyValueStore — KeyValueStore backed by the sync_settings collection
// =============================================================================
import SyncSetting from '../models/SyncSetting';
import { safeDbCall } from '../utils/DatabaseError';
import { KeyValueStore } from './types';

export class MongoKeyValueStore implements KeyValueStore {
  async get(key: string): Promise<string | null> {
    const doc = await safeDbCall('readSetting', () => SyncSetting.findOne({ key }).exec());
    return doc ? doc.value : null;
  }

  async set(key: string, value: string): Promise<void> {
    await safeDbCall('writeSetting', () =>
      SyncSetting.updateOne({ key }, { $set: { value } }, { upsert: true }).exec(),
    );
  }

  async delete(key: string): Promise<void> {
    await safeDbCall('writeSetting', () => SyncSetting.deleteOne({ key }).exec());
  }
}
