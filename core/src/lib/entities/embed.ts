export interface EmbedField {
    name: string;
    value: string;
    inline?: boolean;
}

export interface EmbedFooter {
    text: string;
    icon_url?: string;
}

export interface APIEmbedPayload {
    title?: string;
    description?: string;
    url?: string;
    color?: number;
    timestamp?: string;
    footer?: EmbedFooter;
    fields: EmbedField[];
}

/** Minimal chainable embed builder serialising to Discord's embed object. */
export class Embed {
    title?: string;
    description?: string;
    url?: string;
    colour?: number;
    timestamp?: Date;

    private readonly fields: EmbedField[] = [];
    private footer?: EmbedFooter;

    constructor(init: { title?: string; description?: string; url?: string; colour?: number; timestamp?: Date } = {}) {
        this.title = init.title;
        this.description = init.description;
        this.url = init.url;
        this.colour = init.colour;
        this.timestamp = init.timestamp;
    }

    addField(name: string, value: string, inline = false): this {
        this.fields.push({ name, value, inline });
        return this;
    }

    setFooter(text: string, iconUrl?: string): this {
        this.footer = { text, icon_url: iconUrl };
        return this;
    }

    toJSON(): APIEmbedPayload {
        return {
            title: this.title,
            description: this.description,
            url: this.url,
            color: this.colour,
            timestamp: this.timestamp?.toISOString(),
            footer: this.footer,
            fields: this.fields.map(f => ({ ...f })),
        };
    }
}
