/**
 * Handling CloudShelf errors
 *
 * Every failure is one of AuthenticationError, NotFoundError,
 * StorageError or FormatError.
 */

import {
  AuthenticationError,
  CloudShelf,
  connect,
  FormatError,
  NotFoundError,
  StorageError,
} from '../src';

async function open(): Promise<CloudShelf | null> {
  try {
    return await connect(process.env.DROPBOX_TOKEN ?? '');
  } catch (error) {
    if (error instanceof AuthenticationError) {
      console.error(`Could not connect (${error.code}): ${error.message}`);
      return null;
    }
    throw error;
  }
}

async function main() {
  const shelf = await open();
  if (!shelf) {
    return;
  }

  try {
    if (!(await shelf.fileExists('inbox/latest.yaml'))) {
      console.log('Nothing to read yet');
      return;
    }
    const latest = await shelf.readYaml('inbox/latest.yaml');
    console.log('Latest:', Object.fromEntries(latest));

    await shelf.move('inbox/latest.yaml', 'archive/latest.yaml');
  } catch (error) {
    if (error instanceof NotFoundError) {
      console.error('Gone before we got to it:', error.path);
    } else if (error instanceof FormatError) {
      console.error(`Unreadable ${error.format} payload: ${error.message}`);
    } else if (error instanceof StorageError) {
      console.error(`Storage failure (${error.code}, status ${error.status ?? 'n/a'})`);
    } else {
      throw error;
    }
  } finally {
    await shelf.close();
  }
}

main().catch(console.error);
