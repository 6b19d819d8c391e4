export interface NotificationMessage {
    /** Episode title as published */
    title: string;
    transcriptPath: string;
}

export interface Notifier {
    readonly enabled: boolean;
    /** Resolves to whether the notification was delivered; never rejects. */
    notify(message: NotificationMessage): Promise<boolean>;
}
