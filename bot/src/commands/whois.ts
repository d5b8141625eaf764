import { CommandResponse, Embed, command, option } from 'slashhook';

/**
 * /whois - Look up a member, or yourself. Answers privately.
 */
export const whois = command({
    name: 'whois',
    description: 'Show details about a member',
    options: {
        member: option.member().describe('Defaults to you').optional(),
    },
    async handler(interaction, { member }) {
        const subject = member ?? interaction.member;
        if (!subject) {
            const user = interaction.user;
            const embed = new Embed({ title: user.displayName }).addField('ID', user.id, true);
            return new CommandResponse({ embeds: [embed], ephemeral: true });
        }

        const embed = new Embed({ title: subject.displayName, colour: 0x5865f2 })
            .addField('ID', subject.id, true)
            .addField('Roles', String(subject.roles.length), true)
            .setFooter(subject.user.username, subject.displayAvatar.url({ size: 64 }));
        if (subject.joinedAt) {
            embed.addField('Joined', `<t:${Math.floor(subject.joinedAt.getTime() / 1000)}:D>`, true);
        }

        return new CommandResponse({ embeds: [embed], ephemeral: true });
    },
});
