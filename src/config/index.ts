// src/config/index.ts

export const config = {
    imageCompression: {
        compressionLevel: 7,
        adaptiveFiltering: false,
    },
    outputExtensions: ['.png'],
    defaultEncodeOutput: 'output.png',
    defaultDecodeOutput: 'decoded_file',
};
