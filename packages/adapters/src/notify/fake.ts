import { type Notifier } from '@worksheetbot/core';

export class FakeNotifier implements Notifier {
    public readonly sent: string[] = [];
    private failure: Error | null = null;

    public failWith(error: Error | null): void {
        this.failure = error;
    }

    public async notify(link: string): Promise<void> {
        if (this.failure) throw this.failure;
        this.sent.push(link);
    }
}
