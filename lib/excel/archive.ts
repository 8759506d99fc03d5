/**
 * ZIP archive reading for OOXML workbooks
 * Pulls selected XML parts out of an .xlsx container
 */

import concat from 'concat-stream';
import yauzl from 'yauzl';

/**
 * Read the entries accepted by `filterFn` as UTF-8 text, keyed by path.
 * The archive is fully drained and closed before the promise resolves.
 */
export function readArchiveEntries(
  buffer: Buffer,
  filterFn: (fileName: string) => boolean
): Promise<Map<string, string>> {
  return new Promise((resolve, reject) => {
    yauzl.fromBuffer(buffer, { lazyEntries: true }, (err, zipfile) => {
      if (err) return reject(err);
      if (!zipfile) return reject(new Error('Failed to open zip file'));

      const entries = new Map<string, string>();

      zipfile.on('entry', (entry: yauzl.Entry) => {
        if (!filterFn(entry.fileName)) {
          zipfile.readEntry();
          return;
        }

        zipfile.openReadStream(entry, (streamErr, readStream) => {
          if (streamErr) return reject(streamErr);
          if (!readStream) return reject(new Error(`Failed to open ${entry.fileName}`));

          readStream.on('error', reject);
          readStream.pipe(
            concat((data: Buffer) => {
              entries.set(entry.fileName, data.toString('utf8'));
              zipfile.readEntry();
            })
          );
        });
      });

      zipfile.on('end', () => resolve(entries));
      zipfile.on('error', reject);

      zipfile.readEntry();
    });
  });
}
