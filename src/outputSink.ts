// src/outputSink.ts

const TAB_WIDTH = 8;

/**
 * 出力カラムを追跡する文字出力先。
 * TAB(n) のために現在のカラムを保持します。
 */
export class OutputSink {
    private column: number = 0;

    constructor(private readonly writeFn: (text: string) => void) {}

    write(text: string): void {
        if (text.length === 0) return;
        for (const char of text) {
            this.advance(char);
        }
        this.writeFn(text);
    }

    writeBytes(bytes: Uint8Array): void {
        this.write(String.fromCharCode(...bytes));
    }

    newline(): void {
        this.write('\n');
    }

    /**
     * カラムが n に達するまで空白を出力します。
     */
    tab(n: number): void {
        if (this.column >= n) return;
        this.write(' '.repeat(n - this.column));
    }

    /** 入力行を読んだ後など、カーソルが行頭に戻ったことを通知します */
    resetColumn(): void {
        this.column = 0;
    }

    getColumn(): number {
        return this.column;
    }

    private advance(char: string): void {
        const code = char.charCodeAt(0);
        if (code === 8 || code === 127) {
            if (this.column > 0) this.column--;
        } else if (char === '\n' || char === '\r') {
            this.column = 0;
        } else if (char === '\t') {
            this.column += TAB_WIDTH - (this.column % TAB_WIDTH);
        } else {
            this.column++;
        }
    }
}
