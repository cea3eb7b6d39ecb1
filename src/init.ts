/**
 * Boot entry: outbound-recorder/init.
 * Import first, before modules that capture a reference to fetch or undici.request.
 * Reads .outbound-recorder/config.yml (or OUTBOUND_RECORDER_CONFIG_PATH), installs the
 * configured sink and patches the configured clients.
 */

import { bootstrap } from './bootstrap';

bootstrap();
