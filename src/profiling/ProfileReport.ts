import type { NotificationService } from '../notification/NotificationService.js';
import type { Notification } from '../notification/types.js';
import type { ProfileStack } from './ProfileStack.js';

export const PROFILE_REPORT_HEADING = '# Profile';

export function buildProfileReport(stack: ProfileStack): string[] {
  return [PROFILE_REPORT_HEADING, ...stack.render()];
}

/**
 * Show the profile of `stack` as a markdown notification
 */
export function showProfile(stack: ProfileStack, notifier: NotificationService): Notification {
  return notifier.markdown(buildProfileReport(stack));
}
