import { StorageBucket, defaultBucket } from '../firebase/admin';
import type { ArtifactStore } from './artifactStore';

export class CloudStorageArtifactStore implements ArtifactStore {
  private readonly bucket: StorageBucket;

  constructor(bucket?: StorageBucket) {
    this.bucket = bucket ?? defaultBucket();
  }

  async putJson(path: string, value: unknown): Promise<void> {
    await this.putText(path, JSON.stringify(value, null, 2), 'application/json');
  }

  async putText(path: string, text: string, contentType = 'text/plain'): Promise<void> {
    await this.bucket.file(path).save(text, { contentType, resumable: false });
  }

  async getText(path: string): Promise<string | null> {
    const file = this.bucket.file(path);
    const [exists] = await file.exists();
    if (!exists) {
      return null;
    }
    const [contents] = await file.download();
    return contents.toString('utf-8');
  }

  async delete(path: string): Promise<void> {
    await this.bucket.file(path).delete({ ignoreNotFound: true });
  }
}
