/**
 * 企业微信 Webhook 机器人通知渠道
 *
 * 使用 undici fetch 发送 markdown 格式消息到企业微信群机器人。
 * 响应异常时抛错，由补偿处理记录为 failed 并在下一轮重试。
 */

import { fetch, type Dispatcher } from "undici";
import pino from "pino";
import type { NotificationChannel, NotificationMessage } from "./channel.js";

const logger = pino({ name: "wecom-channel" });

export class WeComChannel implements NotificationChannel {
  readonly name = "wecom";

  constructor(
    private webhookUrl: string,
    private dispatcher?: Dispatcher,
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const markdown = [
      `## 评审流水线未通过`,
      `> **变更**: ${message.subject}`,
      `> **流水线**: ${message.pipeline}`,
      `> **运行 ID**: ${message.runId}`,
      `> **状态**: ${message.status}`,
      `> **原因**: ${message.reason}`,
      ...(message.factors.length > 0 ? [`> **相关任务**: ${message.factors.join(", ")}`] : []),
      `> **时间**: ${message.timestamp}`,
      ``,
      `请及时检查并处理。`,
    ].join("\n");

    const resp = await fetch(this.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        msgtype: "markdown",
        markdown: { content: markdown },
      }),
      dispatcher: this.dispatcher,
    });

    if (!resp.ok) {
      const body = await resp.text();
      logger.warn({ status: resp.status, body }, "企业微信 Webhook 响应异常");
      throw new Error(`WeCom webhook responded ${resp.status}`);
    }
  }
}
