/**
 * Example 02: PTZ control
 *
 * This example demonstrates how to:
 * - Set up a single channel and run a first refresh
 * - Read the online status
 * - Turn the camera to a stored PTZ position
 * - Move the camera in one direction
 * - Poll the channel in the background
 *
 * Prerequisites:
 * - A PTZ capable Imou camera with at least one favourite point
 */

import { ImouSelect, PlatformEnum, PtzEnum, setupChannel } from '../src';

// Configuration
const APP_ID = 'your-app-id';
const APP_SECRET = 'your-app-secret';
const DEVICE_ID = 'your-device-serial'; // Change to the serial of your camera
const CHANNEL_ID = '0';                  // Channel number (0 for standalone cameras)

async function demonstratePtz() {
  console.log('🎥 Imou PTZ Control Example\n');

  const { client, channel, coordinator } = await setupChannel({
    appId: APP_ID,
    appSecret: APP_SECRET,
    deviceId: DEVICE_ID,
    channelId: CHANNEL_ID,
    scanInterval: 60
  });

  try {
    console.log(`✓ Connected to: ${channel.toString()}`);
    console.log(`  Status: ${channel.getStatus()}\n`);

    // ===== Favourite points =====
    console.log('📍 Favourite points:');
    const collections = channel.getCollections();
    if (collections.length === 0) {
      console.log('  No favourite points configured');
    }
    for (const collection of collections) {
      console.log(`  ${collection.name}`);
    }
    console.log();

    const select = channel
      .getSensorsByPlatform(PlatformEnum.select)
      .find((entity): entity is ImouSelect => entity instanceof ImouSelect);
    if (select && collections.length > 0) {
      select.setEnabled(true);
      await select.update();
      console.log(`Turning to ${collections[0].name}...`);
      await select.selectOption(collections[0].name);
      await delay(3000);
    }

    // ===== Manual movement =====
    console.log('Moving left for one second...');
    if (!(await channel.movePtz(PtzEnum.left, 1000))) {
      console.log('  Camera did not wake up');
    }

    // ===== Polling =====
    const unsubscribe = coordinator.addListener(c => {
      console.log(`Refreshed, status ${channel.getStatus()} (success: ${c.lastUpdateSuccess})`);
    });
    coordinator.start();
    await delay(130_000);
    unsubscribe();

    console.log('\n✨ PTZ demonstration complete!');
  } catch (error) {
    console.error('❌ Error:', error);
  } finally {
    coordinator.stop();
    client.close();
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// Run the example
if (require.main === module) {
  demonstratePtz().catch(console.error);
}

export { demonstratePtz };
