import dotenv from 'dotenv';

import { loadConfig } from './src/config.js';
import { runDashboardVerification } from './src/verify/dashboard-verification.js';

dotenv.config();

async function verify() {
    console.log('🚀 Starting dashboard verification...');
    try {
        const result = await runDashboardVerification(loadConfig());
        console.log(`\n${result.serviceCardVisible ? '✅' : '❌'} User Service card visible: ${result.serviceCardVisible}`);
        console.log(`📸 Screenshot: ${result.screenshotPath}`);
    } catch (error) {
        console.error('\n❌ Verification Failed:', error);
        process.exit(1);
    }
}

void verify();
