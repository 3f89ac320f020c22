/**
 * Unbounded single-consumer message channel. Producers never block and never
 * fail: sending to a closed channel just reports `false`.
 */
export class Channel<T> {
    private readonly buffer: T[] = [];
    private closed = false;

    get isClosed(): boolean {
        return this.closed;
    }

    get size(): number {
        return this.buffer.length;
    }

    send(message: T): boolean {
        if (this.closed) {
            return false;
        }
        this.buffer.push(message);
        return true;
    }

    tryReceive(): T | undefined {
        return this.buffer.shift();
    }

    /** Removes and returns every buffered message, oldest first. */
    drain(): T[] {
        return this.buffer.splice(0, this.buffer.length);
    }

    close(): void {
        this.closed = true;
        this.buffer.length = 0;
    }
}
