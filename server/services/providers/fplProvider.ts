import { getConfig } from "../../config";
import { HttpProviderAdapter, type HttpProviderConfig } from "./httpProvider";

export class FPLProvider extends HttpProviderAdapter {
  constructor(config?: Partial<HttpProviderConfig>) {
    const { fpl } = getConfig();
    super('fpl-api', {
      ...config,
      baseUrl: config?.baseUrl ?? fpl.baseUrl,
      timeoutMs: config?.timeoutMs ?? fpl.timeoutMs,
      retries: config?.retries ?? fpl.retries,
      defaultHeaders: {
        'User-Agent': 'fpl-chat-assistant/1.0',
        Accept: 'application/json',
        ...(config?.defaultHeaders ?? {}),
      },
    });
  }

  getBootstrapStatic(): Promise<unknown> {
    return this.getJson('/bootstrap-static/');
  }

  getFixtures(): Promise<unknown> {
    return this.getJson('/fixtures/');
  }
}
