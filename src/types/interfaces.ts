/**
 * Seams over the filesystem and process environment, so config handling can run against fakes.
 */

export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  writeFile(path: string, data: string): void;
  chmod(path: string, mode: number): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
  unlink(path: string): void;
}

export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
}
