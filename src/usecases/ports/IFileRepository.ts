import { SourceText } from './ISyntaxRepository';

export interface IFileRepository {
  readSource(filePath: string): Promise<SourceText>;
  writeSource(source: SourceText): Promise<void>;
}
