import * as fs from 'fs/promises';
import { IFileRepository } from '../../usecases/ports/IFileRepository';
import { SourceText } from '../../usecases/ports/ISyntaxRepository';

/** Source files as the CLI reads and rewrites them. The filename is kept as given. */
export class FsRepository implements IFileRepository {
  async readSource(filePath: string): Promise<SourceText> {
    const content = await fs.readFile(filePath, 'utf-8');
    return { filename: filePath, content };
  }

  async writeSource(source: SourceText): Promise<void> {
    await fs.writeFile(source.filename, source.content, 'utf-8');
  }
}
