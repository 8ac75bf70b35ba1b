// src/cliRunner.ts - CLI実行ロジック

import * as fs from 'fs';
import BasicInterpreter from './basicInterpreter.js';
import { BasicError, isBasicError } from './errors.js';

export const DEFAULT_MAX_STEPS = 100000;
export const MEMORY_SIZE = 0x10000;

export interface CLIRunnerConfig {
    debug: boolean;
    verbose: boolean;
    quiet?: boolean;
    unlimitedSteps?: boolean;
    maxSteps?: number;
    outputFile?: string;
    writeFn?: (text: string) => void; // 省略時は標準出力
    getLineFn?: () => string | null; // 省略時は標準入力から1行ずつ読む
}

export interface RunSummary {
    steps: number;
    completed: boolean; // false ならステップ数上限で打ち切り
    error?: string;
}

export class CLIRunner {
    private config: CLIRunnerConfig;
    private memory: Uint8Array = new Uint8Array(MEMORY_SIZE);
    private transcript: string[] = [];

    constructor(config: CLIRunnerConfig) {
        this.config = config;
    }

    /**
     * プログラムを最後まで（またはステップ数上限まで）実行する
     * @throws 実行時エラー。報告を表示・保存した後に再送出します
     */
    async executeScript(script: string, scriptName?: string): Promise<RunSummary> {
        if (this.config.verbose) {
            console.log(`🔍 プログラムを読み込み中: ${scriptName || 'Unknown'}`);
        }

        this.transcript = [];
        this.memory.fill(0);

        const interpreter = new BasicInterpreter({
            writeFn: (text: string) => this.write(text),
            getLineFn: this.config.getLineFn ?? readStdinLine,
            peekFn: (address: number) => this.peek(address),
            pokeFn: (address: number, value: number) => this.poke(address, value),
            ...(this.config.debug && { debugFn: (message: string) => console.log(`[DEBUG] ${message}`) }),
        });

        interpreter.loadProgram(script);
        if (this.config.verbose) {
            console.log('🚀 実行を開始します...\n');
        }

        const maxSteps = this.config.unlimitedSteps ? Infinity : (this.config.maxSteps ?? DEFAULT_MAX_STEPS);
        const startTime = Date.now();
        let steps = 0;

        try {
            const generator = interpreter.run();
            while (!interpreter.isFinished()) {
                if (steps >= maxSteps) {
                    if (!this.config.quiet) {
                        console.log(`\n⚠️  実行ステップ数が上限に達しました（${maxSteps} ステップ）`);
                    }
                    return this.finish({ steps, completed: false });
                }
                generator.next();
                steps++;
            }
        } catch (error) {
            const message = isBasicError(error) ? error.report() : (error instanceof Error ? error.message : String(error));
            console.error(`❌ ${message}`);
            if (this.config.debug && error instanceof Error) {
                console.error('スタックトレース:', error.stack);
            }
            this.finish({ steps, completed: false, error: message });
            throw error;
        }

        if (this.config.verbose) {
            console.log(`\n✅ 実行完了 (${steps} ステップ, ${Date.now() - startTime}ms)`);
        }
        return this.finish({ steps, completed: true });
    }

    getTranscript(): string[] {
        return [...this.transcript];
    }

    /**
     * PEEK関数の実装（64KiBのバイトメモリ）
     */
    private peek(address: number): number {
        this.checkAddress(address);
        return this.memory[address] ?? 0;
    }

    /**
     * POKE関数の実装。値は下位8ビットだけを保存します。
     */
    private poke(address: number, value: number): void {
        this.checkAddress(address);
        this.memory[address] = value & 0xff;
        if (this.config.debug) {
            console.log(`[POKE] [${address}] = ${value & 0xff}`);
        }
    }

    private checkAddress(address: number): void {
        if (address < 0 || address >= MEMORY_SIZE) {
            throw new BasicError('InvalidAddress', String(address));
        }
    }

    private write(text: string): void {
        this.transcript.push(text);
        if (this.config.writeFn) {
            this.config.writeFn(text);
        } else {
            process.stdout.write(text);
        }
    }

    private finish(summary: RunSummary): RunSummary {
        if (this.config.outputFile) {
            this.saveToFile(summary);
        }
        return summary;
    }

    /**
     * 結果をファイルに保存
     */
    private saveToFile(summary: RunSummary): void {
        if (!this.config.outputFile) return;

        const output = {
            timestamp: new Date().toISOString(),
            transcript: this.transcript,
            steps: summary.steps,
            error: summary.error ?? null,
        };

        fs.writeFileSync(this.config.outputFile, JSON.stringify(output, null, 2));
        if (!this.config.quiet) {
            console.log(`💾 結果を保存しました: ${this.config.outputFile}`);
        }
    }
}

/**
 * 標準入力から1行を同期的に読む（改行を含む）。入力終端で null。
 */
export function readStdinLine(): string | null {
    const bytes: number[] = [];
    const buffer = Buffer.alloc(1);
    for (;;) {
        let count: number;
        try {
            count = fs.readSync(0, buffer, 0, 1, null);
        } catch (error) {
            // 非ブロッキングのパイプでは再試行
            if (error instanceof Error && 'code' in error && error.code === 'EAGAIN') {
                continue;
            }
            if (error instanceof Error && 'code' in error && error.code === 'EOF') {
                count = 0;
            } else {
                throw error;
            }
        }
        if (count === 0) {
            return bytes.length > 0 ? Buffer.from(bytes).toString('latin1') : null;
        }
        const byte = buffer[0] ?? 0;
        bytes.push(byte);
        if (byte === 0x0a) {
            return Buffer.from(bytes).toString('latin1');
        }
    }
}
