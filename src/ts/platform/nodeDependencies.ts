/**
 * Production wiring of the platform dependencies
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Dependencies } from '../core/types';
import { execCommand } from './exec';

export function createNodeDependencies(): Dependencies {
  return {
    exec: execCommand,
    readFile: (file) => fs.readFile(file, 'utf-8'),
    writeFile: async (file, content) => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, content, 'utf-8');
    },
    networkInterfaces: () => os.networkInterfaces(),
    platform: process.platform
  };
}
