import { api } from './api';
import type { JsonObject } from '@/types/json';

export interface PushSubscriptionPayload {
  // Browser-local notifications register as { type: 'browser', enabled: true }
  subscription: JsonObject;
}

function authHeaders(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

export const notificationService = {
  // Register push subscription (or the browser-notification preference)
  registerPushSubscription: (payload: PushSubscriptionPayload, token: string) =>
    api.post<{ success: boolean }>('/users/push-subscription', payload, { headers: authHeaders(token) }),

  // Unregister push subscription
  unregisterPushSubscription: (token: string) =>
    api.delete<{ success: boolean }>('/users/push-subscription', { headers: authHeaders(token) }),
};
