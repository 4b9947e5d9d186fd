import { createHash } from 'crypto';
import { Hash } from './model';

export default function sha1(data: Uint8Array): Hash {
  return createHash('sha1').update(data).digest('hex');
}
