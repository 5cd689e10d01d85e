import { createWriteStream } from 'node:fs';

import archiver from 'archiver';

export interface ZipEntry {
  name: string;
  content: string;
}

/** Writes `entries` into a zip archive at `file`. */
export async function writeZip(file: string, entries: readonly ZipEntry[]): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(file);
    const zip = archiver('zip', { zlib: { level: 9 } });
    output.on('close', resolve);
    output.on('error', reject);
    zip.on('error', reject);
    zip.pipe(output);
    for (const entry of entries) {
      zip.append(entry.content, { name: entry.name });
    }
    zip.finalize().catch(reject);
  });
}

export const TEST_EXTENSION_ID = 'fxdriver@example.test';

export const INSTALL_RDF = `<?xml version="1.0"?>
<RDF xmlns="http://www.w3.org/1999/02/22-rdf-syntax-ns#"
     xmlns:em="http://www.mozilla.org/2004/em-rdf#">
  <Description about="urn:mozilla:install-manifest">
    <em:id>${TEST_EXTENSION_ID}</em:id>
    <em:version>1.0</em:version>
    <em:targetApplication>
      <Description>
        <em:id>{ec8030f7-c20a-464f-9b0e-13a3a9e97384}</em:id>
      </Description>
    </em:targetApplication>
  </Description>
</RDF>
`;

/** An extension archive with an install.rdf and a nested file. */
export function extensionEntries(): ZipEntry[] {
  return [
    { name: 'install.rdf', content: INSTALL_RDF },
    { name: 'content/driver.js', content: 'var started = true;\n' },
    { name: 'chrome.manifest', content: 'content driver content/\n' },
  ];
}
