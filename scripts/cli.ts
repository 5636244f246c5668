import { createCli } from 'cli/index';

createCli()
    .execute()
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
