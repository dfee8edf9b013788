import { AlreadyActiveError, NoActiveJobError, SettingsValidationError, describeError } from "../errors";
import { logger } from "../logger";
import type { CompletionArtifacts, JobManager, JobNotifier } from "../services/jobManager";
import type { SettingsService } from "../services/settingsService";
import type { JobSnapshot } from "../types/job";
import { slugify } from "../utils/text";
import { MIN_TOPIC_LENGTH, parseCommand } from "./commands";
import {
  TEXTS,
  completedText,
  failedText,
  progressFallbackText,
  progressText,
  settingUpdatedText,
  settingsText,
  sourcesFileText,
  startText,
  statusText,
} from "./messages";
import type { ChatTransport } from "./telegramTransport";

export interface IncomingMessage {
  chatId: string;
  text: string;
}

/**
 * Chat front end. Each chat id is a user id; the bot turns commands into
 * manager calls and renders lifecycle notifications back into the chat.
 */
export class ResearchBot implements JobNotifier {
  /** Message edited in place with progress, per chat. */
  private readonly progressMessages = new Map<string, number>();
  /** Tail of the notification chain per chat; deliveries run one at a time. */
  private readonly deliveries = new Map<string, Promise<void>>();

  constructor(
    private readonly manager: JobManager,
    private readonly settings: SettingsService,
    private readonly transport: ChatTransport,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async handleMessage({ chatId, text }: IncomingMessage) {
    const command = parseCommand(text);
    switch (command.kind) {
      case "start":
        await this.reply(chatId, TEXTS.welcome);
        return;
      case "help":
        await this.reply(chatId, TEXTS.help);
        return;
      case "research":
        await this.startResearch(chatId, command.topic);
        return;
      case "status":
        await this.reply(chatId, statusText(await this.manager.status(chatId)));
        return;
      case "cancel":
        await this.cancelResearch(chatId);
        return;
      case "sources":
        await this.sendSources(chatId);
        return;
      case "settings":
        await this.changeSettings(chatId, command.args);
        return;
      case "ignored":
        return;
    }
  }

  async onProgress(snapshot: JobSnapshot) {
    if (!snapshot.progress) {
      return;
    }
    const progress = snapshot.progress;
    const chatId = snapshot.userId;
    await this.deliver(chatId, () =>
      this.showInProgressMessage(chatId, progressText(progress), progressFallbackText(progress)),
    );
  }

  async onCompleted(snapshot: JobSnapshot, artifacts: CompletionArtifacts) {
    await this.deliver(snapshot.userId, () => this.deliverReport(snapshot, artifacts));
  }

  async onCancelled(snapshot: JobSnapshot) {
    await this.deliver(snapshot.userId, async () => {
      this.progressMessages.delete(snapshot.userId);
      await this.reply(snapshot.userId, TEXTS.cancelled);
    });
  }

  async onFailed(snapshot: JobSnapshot) {
    await this.deliver(snapshot.userId, async () => {
      this.progressMessages.delete(snapshot.userId);
      await this.reply(snapshot.userId, failedText(snapshot));
    });
  }

  /**
   * Runs `task` after every earlier delivery for the chat has settled, so
   * edits land in step order and only the first tick creates a message.
   * Failures reach the caller; the chain itself keeps going.
   */
  private deliver(chatId: string, task: () => Promise<void>) {
    const previous = this.deliveries.get(chatId) ?? Promise.resolve();
    const current = previous.then(task);
    this.deliveries.set(
      chatId,
      current.then(
        () => undefined,
        () => undefined,
      ),
    );
    return current;
  }

  private async deliverReport(snapshot: JobSnapshot, artifacts: CompletionArtifacts) {
    const chatId = snapshot.userId;
    const summary = completedText(snapshot);
    await this.showInProgressMessage(chatId, summary, summary);
    this.progressMessages.delete(chatId);

    await this.transport.sendDocument(chatId, {
      fileName: `${artifacts.fileStem}.md`,
      content: artifacts.markdown,
      contentType: "text/markdown",
      caption: "Markdown report",
    });
    if (artifacts.pdf) {
      await this.transport.sendDocument(chatId, {
        fileName: `${artifacts.fileStem}.pdf`,
        content: artifacts.pdf,
        contentType: "application/pdf",
        caption: "PDF report",
      });
    } else {
      await this.reply(chatId, TEXTS.pdfUnavailable);
    }
  }

  private async startResearch(chatId: string, rawTopic: string) {
    const topic = rawTopic.trim();
    if (!topic) {
      await this.reply(chatId, TEXTS.researchUsage);
      return;
    }
    if (topic.length < MIN_TOPIC_LENGTH) {
      await this.reply(chatId, TEXTS.topicTooShort);
      return;
    }
    if (this.manager.hasActive(chatId)) {
      await this.reply(chatId, TEXTS.alreadyActive);
      return;
    }

    const settings = await this.settings.get(chatId);
    const messageId = await this.transport.sendMessage(chatId, startText(topic, settings));
    const previous = this.progressMessages.get(chatId);
    this.progressMessages.set(chatId, messageId);
    try {
      await this.manager.start(chatId, topic);
    } catch (error) {
      if (previous === undefined) {
        this.progressMessages.delete(chatId);
      } else {
        this.progressMessages.set(chatId, previous);
      }
      if (error instanceof AlreadyActiveError) {
        await this.reply(chatId, TEXTS.alreadyActive);
        return;
      }
      throw error;
    }
  }

  private async cancelResearch(chatId: string) {
    if (!this.manager.hasActive(chatId)) {
      await this.reply(chatId, TEXTS.noActiveJob);
      return;
    }
    await this.reply(chatId, TEXTS.cancelling);
    try {
      await this.manager.cancel(chatId);
    } catch (error) {
      if (error instanceof NoActiveJobError) {
        await this.reply(chatId, TEXTS.noActiveJob);
        return;
      }
      throw error;
    }
  }

  private async sendSources(chatId: string) {
    const snapshot = await this.manager.status(chatId);
    if (!snapshot) {
      await this.reply(chatId, TEXTS.noSourceData);
      return;
    }
    if (!snapshot.sources.length) {
      await this.reply(chatId, TEXTS.noSources);
      return;
    }
    const stamp = Math.floor(this.now().getTime() / 1000);
    await this.transport.sendDocument(chatId, {
      fileName: `sources_${slugify(snapshot.topic, 20)}_${stamp}.txt`,
      content: sourcesFileText(snapshot.topic, snapshot.sources),
      contentType: "text/plain",
      caption: TEXTS.sourcesCaption,
    });
  }

  private async changeSettings(chatId: string, args: string[]) {
    if (!args.length) {
      await this.reply(chatId, settingsText(await this.settings.get(chatId)));
      return;
    }
    if (args.length < 2) {
      await this.reply(chatId, TEXTS.settingsUsage);
      return;
    }
    try {
      const { key, settings } = await this.settings.update(chatId, args[0], args[1]);
      await this.reply(chatId, settingUpdatedText(key, settings));
    } catch (error) {
      if (error instanceof SettingsValidationError) {
        await this.reply(chatId, error.message);
        return;
      }
      throw error;
    }
  }

  /** Edits the tracked progress message, falling back to a fresh message. */
  private async showInProgressMessage(chatId: string, text: string, fallback: string) {
    const messageId = this.progressMessages.get(chatId);
    if (messageId !== undefined) {
      try {
        await this.transport.editMessage(chatId, messageId, text);
        return;
      } catch (error) {
        logger.debug({ chatId, error: describeError(error) }, "Progress edit failed, sending new message");
      }
      await this.reply(chatId, fallback);
      return;
    }
    this.progressMessages.set(chatId, await this.transport.sendMessage(chatId, text));
  }

  private async reply(chatId: string, text: string) {
    await this.transport.sendMessage(chatId, text);
  }
}
