import { Firestore } from 'firebase-admin/firestore';
import { COLLECTIONS } from '../config/firestore';
import { Bill } from '../types';
import { StorageError, getErrorMessage } from '../utils/errors';

/**
 * Read-only view of bills owned by the upload service
 */
export interface BillDirectory {
  exists(billId: string): Promise<boolean>;
  get(billId: string): Promise<Bill | null>;
  count(): Promise<number>;
}

export class FirestoreBillDirectory implements BillDirectory {
  constructor(private readonly db: Firestore) {}

  async exists(billId: string): Promise<boolean> {
    return (await this.get(billId)) !== null;
  }

  async get(billId: string): Promise<Bill | null> {
    try {
      const doc = await this.db.collection(COLLECTIONS.BILLS).doc(billId).get();
      if (!doc.exists) {
        return null;
      }
      const data = doc.data() as Omit<Bill, 'id'>;
      return { ...data, id: doc.id };
    } catch (error) {
      throw new StorageError(`Bill lookup failed: ${getErrorMessage(error)}`, error);
    }
  }

  async count(): Promise<number> {
    try {
      const snapshot = await this.db.collection(COLLECTIONS.BILLS).count().get();
      return snapshot.data().count;
    } catch (error) {
      throw new StorageError(`Bill count failed: ${getErrorMessage(error)}`, error);
    }
  }
}

export class MemoryBillDirectory implements BillDirectory {
  private bills = new Map<string, Bill>();

  constructor(bills: Bill[] = []) {
    bills.forEach((bill) => this.bills.set(bill.id, bill));
  }

  add(bill: Bill): void {
    this.bills.set(bill.id, bill);
  }

  async exists(billId: string): Promise<boolean> {
    return this.bills.has(billId);
  }

  async get(billId: string): Promise<Bill | null> {
    return this.bills.get(billId) ?? null;
  }

  async count(): Promise<number> {
    return this.bills.size;
  }
}
