export { FsPathSource } from './fs_path_source';
export type { FsPathSourceOptions } from './fs_path_source';
