import { ChatLogEntry, ChatLogFilter, ChatLogRepository } from '../../domain/entities/ChatLogRepository';

export class ListChatLogs {
    constructor(private chatLog: ChatLogRepository) {}

    async execute(filter: ChatLogFilter): Promise<ChatLogEntry[]> {
        return this.chatLog.list(filter);
    }
}
