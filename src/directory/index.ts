/**
 * Directory Module - Barrel Export
 */

export { DirectoryError, type Directory } from './types';
export { HttpDirectory, toPerson, type HttpDirectoryConfig } from './http-directory';
export { StaticDirectory } from './static-directory';
