import { Firestore } from '@google-cloud/firestore';

export function createFirestoreClient(projectId: string | undefined): Firestore {
  return new Firestore({
    projectId,
    ignoreUndefinedProperties: true,
  });
}
