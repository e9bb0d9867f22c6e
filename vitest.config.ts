import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    test: {
        environment: 'node',
        include: ['spec/**/*.test.ts'],
        env: {
            LOG_LEVEL: 'silent',
        },
    },
    resolve: {
        alias: {
            '@src': resolve(root, 'src'),
            '@parley/common': resolve(root, 'packages/common/src/index.ts'),
            '@parley/formatter-cbor': resolve(root, 'packages/formatter-cbor/src/index.ts'),
            '@parley/formatter-msgpack': resolve(root, 'packages/formatter-msgpack/src/index.ts'),
        },
    },
});
