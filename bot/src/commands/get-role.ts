import { CommandResponse, Embed, InteractionContextType, command, option } from 'slashhook';

/**
 * /get-role - Show what Discord resolved for a role option.
 */
export const getRole = command({
    name: 'get-role',
    description: 'Show details about a role',
    contexts: [InteractionContextType.Guild],
    options: {
        role: option.role(),
    },
    async handler(_interaction, { role }) {
        const embed = new Embed({ title: role.name, colour: role.colour || undefined })
            .addField('ID', role.id, true)
            .addField('Position', String(role.position), true)
            .addField('Mentionable', role.mentionable ? 'Yes' : 'No', true);

        return new CommandResponse({ content: `Role ${role.mention} selected.`, embeds: [embed] });
    },
});
