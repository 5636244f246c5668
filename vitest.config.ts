import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

const resolveFromRoot = (relativePath: string): string => {
    const rootDir = path.dirname(fileURLToPath(import.meta.url));
    return path.resolve(rootDir, relativePath);
};

export default defineConfig({
    resolve: {
        alias: {
            'app': resolveFromRoot('src/app'),
            'cli': resolveFromRoot('src/cli'),
            'config': resolveFromRoot('src/config'),
            'game': resolveFromRoot('src/game'),
            'physics': resolveFromRoot('src/physics'),
            'util': resolveFromRoot('src/util'),
        },
    },
    test: {
        environment: 'node',
        include: ['tests/unit/**/*.spec.ts'],
        clearMocks: true,
    },
});
