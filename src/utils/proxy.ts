import * as tunnel from "tunnel";
import { Agent as HttpAgent } from "http";
import { NotificationManager } from "./notification";
import { t } from "./i18n";
import { getCacheConfig } from "./config";
import { getErrorMessage } from "./errors";
import { ProxyProtocol } from "../types";

export function getProxyAgent(): HttpAgent | undefined {
  const enableProxy = getCacheConfig<boolean>("translationServices.proxy.enable", false);

  if (!enableProxy) return undefined;

  const host = getCacheConfig<string>("translationServices.proxy.host", "127.0.0.1");
  const port = getCacheConfig<number>("translationServices.proxy.port", 7890);
  const protocol = getCacheConfig<ProxyProtocol>("translationServices.proxy.protocol", "http");

  try {
    const options = {
      proxy: {
        host,
        port,
        headers: {
          "User-Agent": "Node"
        }
      }
    };
    return protocol === "https" ? tunnel.httpsOverHttps(options) : tunnel.httpsOverHttp(options);
  } catch (e) {
    NotificationManager.showError(t("translator.proxyError.createFailed", getErrorMessage(e)));
    return undefined;
  }
}
