/**
 * Example 01: Discover channels
 *
 * This example demonstrates how to:
 * - Check the Imou open API credentials
 * - List every camera channel bound to or shared with the account
 * - Inspect the entities created for each channel
 *
 * Prerequisites:
 * - An app id and app secret from the Imou open platform
 */

import { discover, ImouError } from '../src';

// Configuration
const APP_ID = 'your-app-id';         // Change to your app id
const APP_SECRET = 'your-app-secret'; // Change to your app secret

async function discoverChannels() {
  console.log('📷 Imou Channel Discovery Example\n');

  try {
    const channels = await discover({ appId: APP_ID, appSecret: APP_SECRET });

    if (Object.keys(channels).length === 0) {
      console.log('No channels found');
      return;
    }

    for (const [name, channel] of Object.entries(channels)) {
      console.log(`${name}`);
      console.log(`  ${channel.toString()}`);
      console.log(`  Sleepable: ${channel.isSleepable() ? 'yes' : 'no'}`);
      for (const entity of channel.getAllSensors()) {
        console.log(`  [${entity.platform}] ${entity.getDescription()}`);
      }
      console.log();
    }
  } catch (error) {
    if (error instanceof ImouError) {
      console.error(`❌ ${error.toString()}`);
    } else {
      console.error('❌ Error:', error);
    }
  }
}

// Run the example
if (require.main === module) {
  discoverChannels().catch(console.error);
}

export { discoverChannels };
