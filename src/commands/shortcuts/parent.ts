import { AutoLoad, Command, Declare } from "seyfert";

@Declare({
  name: "shortcuts",
  description: "Manage this server's text shortcuts",
  contexts: ["Guild"],
  integrationTypes: ["GuildInstall"],
})
@AutoLoad()
export default class ShortcutsParent extends Command {}
