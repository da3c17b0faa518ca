/**
 * Abstract File System Interfaces
 *
 * The generators only need to create a directory and write whole files,
 * but reads are part of the contract so tests can inspect what was written
 * through the same abstraction.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /** Open a file. Mode 'w' creates the file or truncates an existing one. */
  open(path: string, mode: 'r' | 'w'): Promise<IFileHandle>

  /** Get file statistics. */
  stat(path: string): Promise<IFileStat>

  /** Create a directory, including missing parents. */
  mkdir(path: string): Promise<void>

  /** Check if a path exists. */
  exists(path: string): Promise<boolean>

  /** Read directory contents. Returns list of filenames (not full paths). */
  readdir(path: string): Promise<string[]>
}
