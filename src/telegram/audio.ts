import { type AudioCollaborator } from "../reminders/dispatcher";
import { type ChatApi } from "./ui";

/**
 * "Plays" a sound by sending the file to the chat, where the client plays it.
 */
export class TelegramAudio implements AudioCollaborator {
  constructor(
    private readonly api: ChatApi,
    private readonly chatId: number,
  ) {}

  async playAsync(soundRef: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    await this.api.sendAudio(this.chatId, { source: soundRef });
  }
}
