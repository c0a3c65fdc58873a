/**
 * Schema File Watcher
 *
 * Watches a schema file for changes and recompiles it
 */

import { existsSync, watch } from 'fs';
import { compileFile, describeFailure } from './emit.js';
import type { CompilerOutput } from './types.js';

export interface WatcherOptions {
  inputFile: string;
  outputDir: string;
  onCompile?: (success: boolean, error?: Error, output?: CompilerOutput) => void;
  debounce?: number;
  strict?: boolean;
}

export class SchemaWatcher {
  private watcher?: ReturnType<typeof watch>;
  private debounceTimer?: NodeJS.Timeout;
  private readonly debounce: number;

  constructor(private options: WatcherOptions) {
    this.debounce = options.debounce ?? 300; // 300ms default debounce
  }

  start(): void {
    const { inputFile } = this.options;

    if (!existsSync(inputFile)) {
      throw new Error(`Schema file not found: ${inputFile}`);
    }

    console.log(`👀 Watching ${inputFile} for changes...`);

    // Initial compilation
    this.compileSchema();

    this.watcher = watch(inputFile, (eventType) => {
      if (eventType === 'change') {
        this.handleChange();
      }
    });
  }

  stop(): void {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = undefined;
      console.log('🛑 Stopped watching schema file');
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
  }

  private handleChange(): void {
    // Debounce rapid changes
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      console.log('📝 Schema file changed, recompiling...');
      this.compileSchema();
    }, this.debounce);
  }

  private compileSchema(): void {
    const { inputFile, outputDir, onCompile, strict } = this.options;

    try {
      const { output, files } = compileFile(inputFile, outputDir, { strict });

      console.log('✅ Schema compiled successfully');
      for (const file of Object.values(files)) {
        console.log(`   → ${file}`);
      }

      onCompile?.(true, undefined, output);
    } catch (error) {
      console.error('❌ Compilation failed:');
      for (const line of describeFailure(error, inputFile)) {
        console.error(`   ${line}`);
      }
      onCompile?.(false, error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Start watching a schema file
 */
export function watchSchema(options: WatcherOptions): SchemaWatcher {
  const watcher = new SchemaWatcher(options);
  watcher.start();
  return watcher;
}
