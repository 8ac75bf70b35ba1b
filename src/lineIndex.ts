// src/lineIndex.ts

export interface LineIndexEntry {
    lineNumber: number;
    position: number;
}

/**
 * 行番号からソース位置へのキャッシュ。
 * 実行によって到達した行だけが登録されます（初出順、削除はプログラムの再ロード時のみ）。
 */
export class LineIndex {
    private entries: Map<number, number> = new Map();

    /**
     * 行を登録します。既に登録済みの行番号は無視します。
     */
    add(lineNumber: number, position: number): void {
        if (this.entries.has(lineNumber)) {
            return;
        }
        this.entries.set(lineNumber, position);
    }

    find(lineNumber: number): number | undefined {
        return this.entries.get(lineNumber);
    }

    has(lineNumber: number): boolean {
        return this.entries.has(lineNumber);
    }

    clear(): void {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }

    /** 登録順のエントリ一覧（デバッグ用） */
    list(): LineIndexEntry[] {
        return [...this.entries].map(([lineNumber, position]) => ({ lineNumber, position }));
    }
}
