import { resolve } from 'node:path';

import { lintContracts } from '../../libs/contract/lint.js';

async function lint() {
    const dirs = process.argv.slice(2);
    const targets = dirs.length > 0 ? dirs : ['contracts/runtime', 'contracts/nodes'];
    let failed = 0;

    for (const dir of targets) {
        const root = resolve(dir);
        console.log(`Linting contracts in ${root}...`);

        const summary = await lintContracts(root);
        for (const result of summary.results) {
            if (result.errors.length > 0) {
                console.error(`FAIL ${result.path}`);
                for (const error of result.errors) {
                    console.error(`  error: ${error}`);
                }
            } else {
                console.log(`ok   ${result.path}${result.nodeName ? ` (${result.nodeName})` : ''}`);
            }
            for (const warning of result.warnings) {
                console.warn(`  warning: ${warning}`);
            }
        }
        failed += summary.failed;
    }

    if (failed > 0) {
        console.error(`${failed} contract(s) failed validation.`);
        process.exit(1);
    }
    console.log('All contracts valid.');
}

lint().catch(err => {
    console.error(err);
    process.exit(1);
});
