import { ProviderSettings } from "../Config.js";
import { EntraIdOAuthClient } from "./EntraIdOAuthClient.js";
import { KerliixOAuthClient } from "./KerliixOAuthClient.js";
import { OAuthClient } from "./OAuthClient.js";

export function createOAuthClient(settings: ProviderSettings): OAuthClient {
    switch (settings.kind) {
        case 'entra':
            return new EntraIdOAuthClient(settings);
        case 'kerliix':
            return new KerliixOAuthClient(settings);
    }
}
