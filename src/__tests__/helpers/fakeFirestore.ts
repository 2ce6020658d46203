/**
 * In-memory stand-in for the parts of @google-cloud/firestore the services use.
 *
 * All instances share one store so documents written by one service module
 * are visible to another and to the test.
 */

type DocumentData = Record<string, unknown>;

const store = new Map<string, Map<string, DocumentData>>();
let autoId = 0;

function collectionDocs(name: string): Map<string, DocumentData> {
  let docs = store.get(name);
  if (!docs) {
    docs = new Map();
    store.set(name, docs);
  }
  return docs;
}

function firestoreError(message: string, code: number): Error {
  return Object.assign(new Error(message), { code });
}

export class FakeDocumentSnapshot {
  constructor(
    readonly id: string,
    private readonly value: DocumentData | undefined
  ) {}

  get exists(): boolean {
    return this.value !== undefined;
  }

  data(): DocumentData | undefined {
    return this.value ? { ...this.value } : undefined;
  }
}

export class FakeDocumentReference {
  constructor(
    private readonly collectionName: string,
    readonly id: string
  ) {}

  write(data: DocumentData, options?: { merge?: boolean }): void {
    const docs = collectionDocs(this.collectionName);
    const existing = docs.get(this.id);
    docs.set(this.id, options?.merge && existing ? { ...existing, ...data } : { ...data });
  }

  async get(): Promise<FakeDocumentSnapshot> {
    return new FakeDocumentSnapshot(this.id, collectionDocs(this.collectionName).get(this.id));
  }

  async set(data: DocumentData, options?: { merge?: boolean }): Promise<void> {
    this.write(data, options);
  }

  async create(data: DocumentData): Promise<void> {
    if (collectionDocs(this.collectionName).has(this.id)) {
      throw firestoreError(`Document already exists: ${this.collectionName}/${this.id}`, 6);
    }
    this.write(data);
  }
}

export class FakeCollectionReference {
  constructor(private readonly name: string) {}

  doc(id: string = `auto-${++autoId}`): FakeDocumentReference {
    return new FakeDocumentReference(this.name, id);
  }

  async add(data: DocumentData): Promise<FakeDocumentReference> {
    const ref = this.doc();
    ref.write(data);
    return ref;
  }

  async get(): Promise<{ docs: FakeDocumentSnapshot[]; empty: boolean; size: number }> {
    const docs = [...collectionDocs(this.name).entries()].map(
      ([id, value]) => new FakeDocumentSnapshot(id, value)
    );
    return { docs, empty: docs.length === 0, size: docs.length };
  }
}

export class FakeFirestore {
  collection(name: string): FakeCollectionReference {
    return new FakeCollectionReference(name);
  }

  async runTransaction<T>(
    updateFunction: (transaction: {
      get: (ref: FakeDocumentReference) => Promise<FakeDocumentSnapshot>;
      set: (ref: FakeDocumentReference, data: DocumentData, options?: { merge?: boolean }) => void;
    }) => Promise<T>
  ): Promise<T> {
    return await updateFunction({
      get: (ref) => ref.get(),
      set: (ref, data, options) => ref.write(data, options)
    });
  }
}

export const SERVER_TIMESTAMP = 'SERVER_TIMESTAMP';

export const FakeFieldValue = {
  serverTimestamp: () => SERVER_TIMESTAMP
};

export function resetFirestore(): void {
  store.clear();
  autoId = 0;
}

export function seedDoc(collection: string, id: string, data: DocumentData): void {
  collectionDocs(collection).set(id, { ...data });
}

export function readDoc(collection: string, id: string): DocumentData | undefined {
  return collectionDocs(collection).get(id);
}

export function listDocs(collection: string): DocumentData[] {
  return [...collectionDocs(collection).values()];
}
