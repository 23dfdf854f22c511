import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

const DATA_DIR = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'data');

export interface DataFile {
  name: string;
  content: Record<string, unknown>;
}

export function readDataFile(fileName: string): DataFile {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(DATA_DIR, fileName), 'utf-8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Data file ${fileName} is not an object`);
  }
  return { name: fileName, content: Object.fromEntries(Object.entries(raw)) };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

export function stringList(file: DataFile, key: string): string[] {
  const value = file.content[key];
  if (!isStringArray(value)) {
    throw new Error(`Data file ${file.name}: "${key}" must be an array of strings`);
  }
  return value;
}

export function section(file: DataFile, key: string): DataFile {
  const value = file.content[key];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Data file ${file.name}: "${key}" must be an object`);
  }
  return { name: `${file.name}#${key}`, content: Object.fromEntries(Object.entries(value)) };
}

export function sectionList(file: DataFile, key: string): DataFile[] {
  const value = file.content[key];
  if (!Array.isArray(value)) {
    throw new Error(`Data file ${file.name}: "${key}" must be an array`);
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      throw new Error(`Data file ${file.name}: "${key}[${index}]" must be an object`);
    }
    return { name: `${file.name}#${key}[${index}]`, content: Object.fromEntries(Object.entries(item)) };
  });
}
