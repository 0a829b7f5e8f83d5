export interface FrameStreamOptions {
  frameDurationMs: number;
  /** Mono float samples at 16 kHz, exactly one frame long except possibly the last. */
  onFrame: (frame: Float32Array) => void;
}

export interface AudioRecorder {
  isRecording(): boolean;
  startStreaming(options: FrameStreamOptions): Promise<void>;
  stop(): Promise<void>;
}
