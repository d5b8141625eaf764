export { InteractionBot } from './bot.js';
export type { InteractionBotInit, StartOptions } from './bot.js';
export { InteractionBotOptionsSchema, parseBotOptions } from './config.js';
export type { InteractionBotOptions, InteractionBotOptionsInput } from './config.js';
export { createInteractionServer } from './server.js';
export type { InteractionServerOptions } from './server.js';

export {
    Command,
    command,
    commandGroup,
    DEFAULT_CONTEXTS,
    DEFAULT_INTEGRATION_TYPES,
    ApplicationCommandType,
    ApplicationIntegrationType,
    InteractionContextType,
} from './lib/commands/command.js';
export type {
    APICommandPayload,
    AutocompleteProvider,
    CommandInit,
    GroupCommandInit,
    LeafCommandInit,
} from './lib/commands/command.js';
export { OptionSpec, option } from './lib/commands/options.js';
export type { AnyOptionSpec, Choice, DeclaredType, EnumLike, OptionSpecMap, OptionValues } from './lib/commands/options.js';
export {
    ApplicationCommandOptionType,
    MAX_CHOICES,
    PLACEHOLDER_DESCRIPTION,
    buildOptionDescriptor,
    buildOptionDescriptors,
    serializeOption,
} from './lib/commands/option-schema.js';
export type { APIChoicePayload, APIOptionPayload, OptionDescriptor, OptionSchemaContext } from './lib/commands/option-schema.js';
export { FloatBounds, IntegerBounds, StringBounds } from './lib/commands/schema-types.js';
export type { OptionBounds } from './lib/commands/schema-types.js';
export { File } from './lib/commands/file.js';
export type { FileInit, FileSource } from './lib/commands/file.js';
export { CommandRegistry } from './lib/commands/registry.js';
export { materializeArguments, resolveCommand } from './lib/commands/resolution.js';
export type { RawOptionValue, ResolvedCommand } from './lib/commands/resolution.js';
export { runAutocomplete } from './lib/commands/autocomplete.js';
export type { AutocompleteEnvelope } from './lib/commands/autocomplete.js';

export { Interaction, InteractionState, InteractionType } from './lib/interactions/interaction.js';
export type { InteractionPhase } from './lib/interactions/interaction.js';
export { CommandResponse, InteractionResponseType, MessageFlags } from './lib/interactions/response.js';
export type { AttachmentStub, CommandResponseInit, MessageData, ResponseEnvelope } from './lib/interactions/response.js';
export { ResponseAssembler } from './lib/interactions/response-assembler.js';
export type { AssembledReply } from './lib/interactions/response-assembler.js';
export { deferralBody, editOriginalResponse, sendDeferral, sendFollowup } from './lib/interactions/webhooks.js';
export type { DeferOptions } from './lib/interactions/webhooks.js';
export { InteractionDispatcher, SIGNATURE_HEADER, TIMESTAMP_HEADER } from './lib/interactions/dispatcher.js';
export type { DispatchResult, DispatcherOptions, InboundRequest } from './lib/interactions/dispatcher.js';
export { ResolvedEntities } from './lib/interactions/resolved.js';
export { parseInteraction } from './lib/interactions/payload.js';
export type { RawCommandData, RawCommandOption, RawInteraction } from './lib/interactions/payload.js';

export { RestClient, DEFAULT_API_BASE_URL, encodeBody } from './lib/http/rest-client.js';
export type { FetchLike, HttpMethod, RestClientOptions, RestRequest } from './lib/http/rest-client.js';
export { importPublicKey, verifySignature } from './lib/crypto/signature.js';

export { Localisation, Locale, DEFAULT_LOCALE } from './lib/locale/localisation.js';
export type { LocaleDict } from './lib/locale/localisation.js';

export { Asset, AvatarDecoration, CDN_BASE } from './lib/entities/asset.js';
export type { AssetSize } from './lib/entities/asset.js';
export { User } from './lib/entities/user.js';
export { Member } from './lib/entities/member.js';
export { Role } from './lib/entities/role.js';
export type { RoleTags } from './lib/entities/role.js';
export { ChannelType, channelFromData, channelMention, parseChannel } from './lib/entities/channel.js';
export type { Channel, ChannelKind, DMChannel, GroupDMChannel, GuildChannel, OtherChannel, ThreadChannel } from './lib/entities/channel.js';
export { Attachment } from './lib/entities/attachment.js';
export { PartialMessage } from './lib/entities/message.js';
export { Embed } from './lib/entities/embed.js';
export type { APIEmbedPayload, EmbedField } from './lib/entities/embed.js';

export {
    ConfigurationError,
    InteractionStateError,
    MalformedInteractionError,
    RequestFailedError,
    SlashhookError,
    UnknownCommandError,
    UnresolvedReferenceError,
    apiError,
} from './lib/errors/errors.js';
export type { ApiErrorPayload, ErrorCode } from './lib/errors/errors.js';
export { createLogger, loggerOptions } from './lib/logging/logger.js';
export type { Logger } from './lib/logging/logger.js';
