/**
 * Text-file view of a working tree, addressed by forward-slash paths relative
 * to the tree root. The patch stack only ever touches the tree through this.
 */
export interface TreeFileSystem {
  readonly root: string;
  readFile(relPath: string): Promise<string | null>;
  writeFile(relPath: string, content: string): Promise<void>;
  removeFile(relPath: string): Promise<void>;
}
