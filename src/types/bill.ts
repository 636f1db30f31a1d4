import { Timestamp } from 'firebase-admin/firestore';

/**
 * Uploaded bill metadata, owned by the upload service
 */
export interface Bill {
  id: string;
  filename: string;
  status: string;
  size?: number; // bytes
  uploadedAt?: Timestamp;
}
