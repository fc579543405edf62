import { parse as uuidParse, v4 as uuidv4 } from 'uuid';

/**
 * 22 character URL-safe token (a random UUID in unpadded base64url).
 * Used for task ids and the server id.
 */
export function generateUrlSafeId(): string {
  return Buffer.from(uuidParse(uuidv4())).toString('base64url');
}
