/**
 * Delivery Module
 *
 * Sends rendered markdown messages to a chat robot webhook. Every delivery
 * signs a fresh URL; signed URLs are never kept.
 */

import axios from 'axios';
import { NotifierError, NotifierErrorType } from '../error-handling';
import { signUrl } from '../signing';
import { Mentions, RenderedMessage, SignedRequest } from '../types';

export const DEFAULT_DELIVERY_TIMEOUT = 10000;

export interface RobotPayload {
  msgtype: 'markdown';
  markdown: {
    title: string;
    text: string;
  };
  at: {
    isAtAll: boolean;
    atUserIds: string[];
    atMobiles: string[];
  };
}

export interface DeliveryResponse {
  status: number;
  data: unknown;
}

/**
 * The send(url, payload) capability. Implementations reject on transport
 * failures and non-success HTTP statuses.
 */
export interface DeliveryTransport {
  send(url: string, payload: RobotPayload): Promise<DeliveryResponse>;
}

export class HttpDeliveryTransport implements DeliveryTransport {
  private timeout: number;

  constructor(timeout: number = DEFAULT_DELIVERY_TIMEOUT) {
    this.timeout = timeout;
  }

  async send(url: string, payload: RobotPayload): Promise<DeliveryResponse> {
    const response = await axios.post<unknown>(url, payload, {
      headers: { 'Content-Type': 'application/json' },
      timeout: this.timeout
    });
    return { status: response.status, data: response.data };
  }
}

export function buildRobotPayload(message: RenderedMessage, mentions: Mentions): RobotPayload {
  return {
    msgtype: 'markdown',
    markdown: {
      title: message.title,
      text: message.text
    },
    at: {
      isAtAll: mentions.everyone,
      atUserIds: [...mentions.userIds],
      atMobiles: [...mentions.phoneNumbers]
    }
  };
}

/**
 * The robot API answers 200 with { errcode, errmsg }; a non-zero errcode is a rejection.
 */
export function checkRobotResponse(response: DeliveryResponse): void {
  const { data } = response;
  if (typeof data !== 'object' || data === null || !('errcode' in data)) {
    return;
  }

  const errcode = Number(data.errcode);
  if (errcode !== 0) {
    const errmsg = 'errmsg' in data ? String(data.errmsg) : 'unknown error';
    throw new NotifierError(`Robot rejected message: ${errmsg} (errcode ${errcode})`, NotifierErrorType.DELIVERY_ERROR, {
      operation: 'deliver',
      details: { errcode, errmsg }
    });
  }
}

export interface RobotWebhookChannelOptions {
  webhookUrl?: string;
  secret?: string;
  transport: DeliveryTransport;
  /** Milliseconds since epoch, read at signing time */
  clock?: () => number;
}

export class RobotWebhookChannel {
  private webhookUrl?: string;
  private secret?: string;
  private transport: DeliveryTransport;
  private clock: () => number;

  constructor(options: RobotWebhookChannelOptions) {
    this.webhookUrl = options.webhookUrl;
    this.secret = options.secret;
    this.transport = options.transport;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Sign the webhook URL with the current clock. Call once per attempt.
   */
  sign(): SignedRequest {
    return signUrl(this.webhookUrl, this.secret, this.clock());
  }

  async send(request: SignedRequest, message: RenderedMessage, mentions: Mentions): Promise<DeliveryResponse> {
    const response = await this.transport.send(request.url, buildRobotPayload(message, mentions));
    checkRobotResponse(response);
    return response;
  }
}
