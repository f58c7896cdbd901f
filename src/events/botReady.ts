import { createEvent } from "seyfert";

export default createEvent({
  data: { name: "botReady" },
  run(user, client) {
    client.logger.info(`[bootstrap] ${user.username} is ready`);
  },
});
