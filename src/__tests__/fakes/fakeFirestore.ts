import { FieldPath, Timestamp } from 'firebase-admin/firestore';

type DocumentBody = Record<string, unknown>;
type FieldRef = string | FieldPath;
type Direction = 'asc' | 'desc';

interface FakeSnapshot {
  id: string;
  exists: boolean;
  data(): DocumentBody | undefined;
}

interface StoredDocument {
  id: string;
  body: DocumentBody;
}

interface Filter {
  field: FieldRef;
  op: string;
  value: unknown;
}

interface Ordering {
  field: FieldRef;
  direction: Direction;
}

interface QueryState {
  filters: Filter[];
  orderings: Ordering[];
  cursor: unknown[] | null;
  limit: number | null;
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Timestamp && b instanceof Timestamp) {
    return a.seconds !== b.seconds ? a.seconds - b.seconds : a.nanoseconds - b.nanoseconds;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  const left = String(a);
  const right = String(b);
  return left === right ? 0 : left < right ? -1 : 1;
}

function readField(doc: StoredDocument, field: FieldRef): unknown {
  return typeof field === 'string' ? doc.body[field] : doc.id;
}

function matches(doc: StoredDocument, filter: Filter): boolean {
  const value = readField(doc, filter.field);
  switch (filter.op) {
    case '==':
      return compareValues(value, filter.value) === 0;
    case '<':
      return compareValues(value, filter.value) < 0;
    case '>=':
      return compareValues(value, filter.value) >= 0;
    case 'array-contains':
      return Array.isArray(value) && value.includes(filter.value);
    default:
      throw new Error(`Unsupported operator in fake: ${filter.op}`);
  }
}

/**
 * In-process stand-in for the slice of Firestore the stores use:
 * document get/set/create, read-then-write transactions, filtered and
 * ordered collection queries with startAfter/limit, and count().
 */
export class FakeFirestore {
  readonly documents = new Map<string, DocumentBody>();
  unavailable = false;

  collection(name: string): FakeCollection {
    return new FakeCollection(this, name);
  }

  async runTransaction<T>(fn: (transaction: FakeTransaction) => Promise<T>): Promise<T> {
    const transaction = new FakeTransaction();
    const result = await fn(transaction);
    for (const write of transaction.writes) {
      await write();
    }
    return result;
  }

  checkAvailable(): void {
    if (this.unavailable) {
      throw new Error('14 UNAVAILABLE: The service is currently unavailable');
    }
  }

  listCollection(name: string): StoredDocument[] {
    const prefix = `${name}/`;
    return Array.from(this.documents.entries())
      .filter(([path]) => path.startsWith(prefix) && !path.slice(prefix.length).includes('/'))
      .map(([path, body]) => ({ id: path.slice(prefix.length), body }));
  }
}

export class FakeQuery {
  constructor(
    protected readonly db: FakeFirestore,
    protected readonly name: string,
    private readonly state: QueryState = { filters: [], orderings: [], cursor: null, limit: null }
  ) {}

  where(field: FieldRef, op: string, value: unknown): FakeQuery {
    return this.next({ filters: [...this.state.filters, { field, op, value }] });
  }

  orderBy(field: FieldRef, direction: Direction = 'asc'): FakeQuery {
    return this.next({ orderings: [...this.state.orderings, { field, direction }] });
  }

  startAfter(...values: unknown[]): FakeQuery {
    return this.next({ cursor: values });
  }

  limit(limit: number): FakeQuery {
    return this.next({ limit });
  }

  async get(): Promise<{ docs: FakeSnapshot[] }> {
    this.db.checkAvailable();
    const { filters, cursor, limit } = this.state;

    let docs = this.db
      .listCollection(this.name)
      .filter((doc) => filters.every((filter) => matches(doc, filter)))
      .sort((a, b) => this.compareDocs(a, b));
    if (cursor) {
      docs = docs.filter((doc) => this.compareToCursor(doc, cursor) > 0);
    }
    if (limit !== null) {
      docs = docs.slice(0, limit);
    }

    return {
      docs: docs.map((doc) => ({ id: doc.id, exists: true, data: () => doc.body })),
    };
  }

  count(): { get(): Promise<{ data(): { count: number } }> } {
    return {
      get: async () => {
        const { docs } = await this.get();
        return { data: () => ({ count: docs.length }) };
      },
    };
  }

  private next(change: Partial<QueryState>): FakeQuery {
    return new FakeQuery(this.db, this.name, { ...this.state, ...change });
  }

  private compareDocs(a: StoredDocument, b: StoredDocument): number {
    for (const { field, direction } of this.state.orderings) {
      const order = compareValues(readField(a, field), readField(b, field));
      if (order !== 0) {
        return direction === 'desc' ? -order : order;
      }
    }
    return 0;
  }

  private compareToCursor(doc: StoredDocument, cursor: unknown[]): number {
    for (let i = 0; i < cursor.length; i++) {
      const { field, direction } = this.state.orderings[i];
      const order = compareValues(readField(doc, field), cursor[i]);
      if (order !== 0) {
        return direction === 'desc' ? -order : order;
      }
    }
    return 0;
  }
}

export class FakeCollection extends FakeQuery {
  doc(id: string): FakeDocumentReference {
    return new FakeDocumentReference(this.db, `${this.name}/${id}`, id);
  }
}

export class FakeDocumentReference {
  constructor(
    private readonly db: FakeFirestore,
    readonly path: string,
    readonly id: string
  ) {}

  async get(): Promise<FakeSnapshot> {
    this.db.checkAvailable();
    const body = this.db.documents.get(this.path);
    return { id: this.id, exists: body !== undefined, data: () => body };
  }

  async set(body: DocumentBody): Promise<void> {
    this.db.checkAvailable();
    this.db.documents.set(this.path, { ...body });
  }

  async create(body: DocumentBody): Promise<void> {
    this.db.checkAvailable();
    if (this.db.documents.has(this.path)) {
      throw new Error(`6 ALREADY_EXISTS: Document already exists: ${this.path}`);
    }
    this.db.documents.set(this.path, { ...body });
  }
}

export class FakeTransaction {
  readonly writes: Array<() => Promise<void>> = [];

  get(ref: FakeDocumentReference): Promise<FakeSnapshot> {
    return ref.get();
  }

  set(ref: FakeDocumentReference, body: DocumentBody): void {
    this.writes.push(() => ref.set(body));
  }
}
