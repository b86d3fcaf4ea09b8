/**
 * Vitest Setup File
 *
 * Silences the logger and console warnings (unknown CLI flags, page script
 * diagnostics) so test output only shows test results.
 */

import { vi } from 'vitest';
import { getLogger } from '../src/shared/services/logging.service.js';

getLogger().setMinLevel('emergency');

vi.spyOn(console, 'warn').mockImplementation(() => undefined);
