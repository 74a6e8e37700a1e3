import dotenv from 'dotenv';

import { loadConfig } from './src/config.js';
import { runDemoRecording } from './src/verify/demo-recording.js';

dotenv.config();

async function record() {
    console.log('🎬 Recording dashboard demo...');
    try {
        const result = await runDemoRecording(loadConfig());
        if (result.drive.completed) {
            console.log(`\n✅ Tour completed (${result.drive.stepsCompleted} steps)`);
        } else {
            console.log(`\n❌ Tour stopped at "${result.drive.failedStep}": ${result.drive.error}`);
        }
        if (result.videoPath) {
            console.log(`🎥 Video: ${result.videoPath}`);
        }
    } catch (error) {
        console.error('\n❌ Recording Failed:', error);
        process.exit(1);
    }
}

void record();
