import { HandlerRegistry } from '@taskgate/sdk';
import { ExternalApiConfig, TopicRouteConfig } from '../config';
import { HttpTopicHandler } from './http-topic.handler';

export { HttpTopicHandler, toResult } from './http-topic.handler';

// One HttpTopicHandler per configured route. Routes must name a configured API.
export function buildRegistry(routes: TopicRouteConfig[], apis: ExternalApiConfig[]): HandlerRegistry {
    const registry = new HandlerRegistry();
    for (const route of routes) {
        const api = apis.find(candidate => candidate.name === route.api);
        if (!api) {
            throw new Error(`Topic "${route.topic}" routes to unknown API "${route.api}"`);
        }
        registry.register(route.topic, new HttpTopicHandler(route, route.account ?? api.defaultAccount));
    }
    return registry;
}
