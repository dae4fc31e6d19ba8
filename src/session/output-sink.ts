export interface OutputSink {
  /** Resolves once the chunk has been handed to the underlying stream. */
  write(chunk: Uint8Array): Promise<void>;
}

export class WritableSink implements OutputSink {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  write(chunk: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(chunk, (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

export function stdoutSink(): OutputSink {
  return new WritableSink(process.stdout);
}

export function stderrSink(): OutputSink {
  return new WritableSink(process.stderr);
}
