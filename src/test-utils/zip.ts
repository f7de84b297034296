import archiver from 'archiver';
import * as fs from 'fs-extra';
import * as path from 'path';

/**
 * 테스트용 ZIP 파일 생성
 * @param entries 항목 이름 → 내용
 */
export async function createZip(outputPath: string, entries: Record<string, string | Buffer>): Promise<string> {
  await fs.ensureDir(path.dirname(outputPath));

  await new Promise<void>((resolve, reject) => {
    const output = fs.createWriteStream(outputPath);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve());
    archive.on('error', (err: Error) => reject(err));

    archive.pipe(output);
    for (const [name, content] of Object.entries(entries)) {
      archive.append(content, { name });
    }
    archive.finalize().catch(reject);
  });

  return outputPath;
}
