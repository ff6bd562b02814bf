export type EntryDoc = {
  logUri: string;
  index: number;
  leafInput: Buffer;
  extraData: Buffer;
  scannedAt: Date;
};

export interface EntryRepository {
  upsertMany(docs: EntryDoc[]): Promise<{ upserted: number; modified: number }>;
}
