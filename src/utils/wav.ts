export interface WavInfo {
    sampleRate: number;
    channels: number;
    bitsPerSample: number;
    byteRate: number;
    dataLength: number;
    durationSeconds: number;
}

/**
 * Reads the RIFF/WAVE header of a PCM clip. Chunks are walked rather than
 * assuming the canonical 44-byte layout, since services may add LIST chunks.
 */
export const readWavInfo = (wav: Buffer): WavInfo => {
    if (wav.length < 12 || wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
        throw new Error('not a RIFF/WAVE payload');
    }

    let fmt: Omit<WavInfo, 'dataLength' | 'durationSeconds'> | undefined;
    let offset = 12;
    while (offset + 8 <= wav.length) {
        const id = wav.toString('ascii', offset, offset + 4);
        const size = wav.readUInt32LE(offset + 4);
        const body = offset + 8;

        if (id === 'fmt ') {
            fmt = {
                channels: wav.readUInt16LE(body + 2),
                sampleRate: wav.readUInt32LE(body + 4),
                byteRate: wav.readUInt32LE(body + 8),
                bitsPerSample: wav.readUInt16LE(body + 14),
            };
        } else if (id === 'data') {
            if (!fmt) throw new Error('data chunk before fmt chunk');
            if (fmt.byteRate === 0) throw new Error('byte rate is zero');
            // streamed responses may leave the size at 0 or 0xFFFFFFFF
            const dataLength = size === 0 || body + size > wav.length ? wav.length - body : size;
            return { ...fmt, dataLength, durationSeconds: dataLength / fmt.byteRate };
        }
        offset = body + size + (size % 2);
    }

    throw new Error('no data chunk found');
};

export const createWavHeader = (dataLength: number, sampleRate = 24000, channels = 1, bitsPerSample = 16): Buffer => {
    const byteRate = (sampleRate * channels * bitsPerSample) / 8;
    const blockAlign = (channels * bitsPerSample) / 8;
    const header = Buffer.alloc(44);

    header.write('RIFF', 0, 'ascii');
    header.writeUInt32LE(36 + dataLength, 4);
    header.write('WAVE', 8, 'ascii');
    header.write('fmt ', 12, 'ascii');
    header.writeUInt32LE(16, 16);
    header.writeUInt16LE(1, 20); // PCM
    header.writeUInt16LE(channels, 22);
    header.writeUInt32LE(sampleRate, 24);
    header.writeUInt32LE(byteRate, 28);
    header.writeUInt16LE(blockAlign, 32);
    header.writeUInt16LE(bitsPerSample, 34);
    header.write('data', 36, 'ascii');
    header.writeUInt32LE(dataLength, 40);

    return header;
};

export const pcmToWav = (pcm: Buffer, sampleRate = 24000): Buffer =>
    Buffer.concat([createWavHeader(pcm.length, sampleRate), pcm]);
