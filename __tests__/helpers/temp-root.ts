import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * Scratch repository root laid out like the default configuration
 */
export class TempRoot {
  readonly root: string;

  constructor() {
    this.root = fs.mkdtempSync(path.join(os.tmpdir(), 'html5-harness-'));
  }

  path(...parts: string[]): string {
    return path.join(this.root, ...parts);
  }

  write(relPath: string, content: string): string {
    const full = this.path(relPath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content, 'utf-8');
    return full;
  }

  read(relPath: string): string {
    return fs.readFileSync(this.path(relPath), 'utf-8');
  }

  tokenizer(name: string, content: unknown): string {
    return this.write(`html5lib-tests/tokenizer/${name}`, JSON.stringify(content));
  }

  tree(name: string, content: string): string {
    return this.write(`html5lib-tests/tree-construction/${name}`, content);
  }

  encoding(name: string, content: string): string {
    return this.write(`html5lib-tests/encoding/${name}`, content);
  }

  allowlist(content: unknown): string {
    return this.write('data/html5lib_allowlists.json', JSON.stringify(content));
  }

  cleanup(): void {
    fs.rmSync(this.root, { recursive: true, force: true });
  }
}

export function treeBlock(input: string, tree: string[], options: { errors?: string[]; fragment?: string } = {}): string {
  const lines = ['#data', input, '#errors', ...(options.errors ?? [])];
  if (options.fragment !== undefined) {
    lines.push('#document-fragment', options.fragment);
  }
  lines.push('#document', ...tree);
  return lines.join('\n') + '\n\n';
}
