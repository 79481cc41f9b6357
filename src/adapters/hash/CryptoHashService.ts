import { createHash } from 'crypto';
import { HashService } from '../../core/services/HashService';

export class CryptoHashService implements HashService {
  constructor(private algorithm: 'sha256' | 'sha1' = 'sha256') {}

  async computeHash(content: string): Promise<string> {
    const hash = createHash(this.algorithm);
    hash.update(content, 'utf8');
    return hash.digest('hex');
  }
}
