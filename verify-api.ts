import dotenv from 'dotenv';

import { loadConfig } from './src/config.js';
import { runApiVerification } from './src/verify/api-verification.js';

dotenv.config();

async function verify() {
    try {
        const result = await runApiVerification({ config: loadConfig() });
        if (!result.ready) {
            process.exit(1);
        }
    } catch (error) {
        console.error('\n❌ Verification Failed:', error);
        process.exit(1);
    }
}

void verify();
