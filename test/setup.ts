/**
 * Test setup
 * Keeps expected warnings from failing patch operations out of test output.
 */

import { setLoggerConfig } from '@scimkit/lib-core';

setLoggerConfig({ level: 'error' });
