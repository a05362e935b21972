import { cert, initializeApp, type App } from 'firebase-admin/app';
import { getMessaging, type Messaging } from 'firebase-admin/messaging';
import { z } from 'zod';
import { PushDispatchFailure } from '@transit-pulse/domain';
import type { PushGatewayPort, PushMessage } from '@transit-pulse/domain';

const FIREBASE_SERVICE_ACCOUNT_KEY = process.env['FIREBASE_SERVICE_ACCOUNT_KEY'];

const serviceAccountSchema = z.object({
  project_id: z.string(),
  client_email: z.string(),
  private_key: z.string(),
});

/**
 * The env var holds either the service-account JSON itself or a path to it.
 */
function credentialFrom(value: string) {
  if (value.trim().startsWith('{')) {
    const account = serviceAccountSchema.parse(JSON.parse(value));
    return cert({
      projectId: account.project_id,
      clientEmail: account.client_email,
      privateKey: account.private_key,
    });
  }
  return cert(value);
}

export class FirebasePushGateway implements PushGatewayPort {
  private readonly messaging: Messaging;

  constructor(serviceAccount: string | undefined = FIREBASE_SERVICE_ACCOUNT_KEY) {
    if (!serviceAccount) {
      throw new Error('FIREBASE_SERVICE_ACCOUNT_KEY is required for push notifications');
    }
    const app: App = initializeApp({ credential: credentialFrom(serviceAccount) }, 'transit-pulse');
    this.messaging = getMessaging(app);
  }

  async send(message: PushMessage): Promise<string> {
    try {
      return await this.messaging.send({
        token: message.token,
        notification: { title: message.title, body: message.body },
        data: message.data,
      });
    } catch (err) {
      throw new PushDispatchFailure(
        `push to token failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }
}

/** Stand-in used when no service account is configured; every send fails. */
export class DisabledPushGateway implements PushGatewayPort {
  async send(): Promise<string> {
    throw new PushDispatchFailure('push notifications are not configured');
  }
}
