import { CommandResponse, File, RequestFailedError, command, option } from 'slashhook';
import type { Command, FetchLike } from 'slashhook';

/**
 * /attachment-response - Download the uploaded attachment and send it back.
 * Downloading can outlast the 3 second window, so the command defers first.
 */
export const createAttachmentResponse = (fetchImpl: FetchLike = fetch): Command => command({
    name: 'attachment-response',
    description: 'Upload an attachment and get it back',
    autoDefer: true,
    options: {
        attachment: option.attachment(),
    },
    async handler(_interaction, { attachment }) {
        const res = await fetchImpl(attachment.url, { method: 'GET' });
        if (!res.ok) {
            throw new RequestFailedError(`GET ${attachment.url} returned ${res.status}`, {
                method: 'GET',
                url: attachment.url,
                upstreamStatus: res.status,
            });
        }
        const data = Buffer.from(await res.arrayBuffer());

        return new CommandResponse({
            content: `You uploaded an attachment with name: ${attachment.filename}, i've attached it to this message!`,
            files: [new File(data, { filename: attachment.filename, description: attachment.description })],
        });
    },
});
