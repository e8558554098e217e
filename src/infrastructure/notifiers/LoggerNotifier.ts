import { Notifier } from "../../domain/services/Notifier";
import { Logger } from "../../application/interfaces/Logger";

/** Stands in for the chat front end: owner messages go to the log. */
export class LoggerNotifier implements Notifier {
  constructor(private readonly logger: Logger) {}

  public notify(ownerId: string, message: string): void {
    this.logger.info("Owner notification", { ownerId, message });
  }
}
