import { NotificationManager } from "@/utils/notification";
import { setConfigTree } from "@/utils/config";

process.env.LC_ALL = "en_US.UTF-8";
NotificationManager.init(null);
setConfigTree({});
