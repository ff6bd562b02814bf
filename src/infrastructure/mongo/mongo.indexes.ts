/**
 * Index plan (applied on first use by the repository):
 * - unique: { logUri: 1, index: 1 }
 */
export const mongoIndexes = {
  entryCollection: [
    { keys: { logUri: 1, index: 1 }, options: { unique: true } }
  ]
};
