import * as fs from 'fs';
import archiver from 'archiver';

export type ArchiveFormat = 'zip' | 'tgz';

/**
 * Writes the contents of `sourceDir` into an archive. With `prefix`, entries
 * are nested under that directory; without it they sit at the archive root.
 * Resolves with the number of entries written.
 */
export function writeArchive(
  format: ArchiveFormat,
  sourceDir: string,
  outputPath: string,
  prefix: string | false = false
): Promise<number> {
  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(outputPath);
    const archive = format === 'zip'
      ? archiver('zip', { zlib: { level: 9 } })
      : archiver('tar', { gzip: true, gzipOptions: { level: 9 } });

    let entries = 0;
    archive.on('entry', () => {
      entries += 1;
    });
    archive.on('warning', reject);
    archive.on('error', reject);
    output.on('error', reject);
    output.on('close', () => resolve(entries));

    archive.pipe(output);
    archive.directory(sourceDir, prefix);
    archive.finalize().catch(reject);
  });
}
