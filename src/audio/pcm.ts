const INT16_SCALE = 32768;

export const BYTES_PER_S16_SAMPLE = 2;

/** Decodes little-endian signed 16-bit PCM into floats in [-1, 1). A trailing odd byte is ignored. */
export const s16leToFloat32 = (audio: Buffer): Float32Array => {
  const sampleCount = Math.floor(audio.length / BYTES_PER_S16_SAMPLE);
  const output = new Float32Array(sampleCount);

  for (let index = 0; index < sampleCount; index += 1) {
    output[index] = audio.readInt16LE(index * BYTES_PER_S16_SAMPLE) / INT16_SCALE;
  }

  return output;
};

/** Serializes samples as little-endian float32, the layout the transcription worker reads. */
export const float32ToLeBuffer = (samples: Float32Array): Buffer => {
  const output = Buffer.allocUnsafe(samples.length * 4);

  for (let index = 0; index < samples.length; index += 1) {
    output.writeFloatLE(samples[index], index * 4);
  }

  return output;
};

export const msToSamples = (ms: number, sampleRate: number): number =>
  Math.max(0, Math.floor((sampleRate * ms) / 1000));

export const samplesToMs = (samples: number, sampleRate: number): number =>
  (samples / sampleRate) * 1000;
