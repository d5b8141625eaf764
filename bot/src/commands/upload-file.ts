import { CommandResponse, command, option } from 'slashhook';

export const uploadFile = command({
    name: 'upload-file',
    description: 'Upload a file and get its name back',
    options: {
        file: option.attachment().describe('Any file'),
    },
    async handler(_interaction, { file }) {
        return new CommandResponse({ content: `You uploaded a file with name: ${file.filename}!`, ephemeral: true });
    },
});
