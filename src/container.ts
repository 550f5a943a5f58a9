import "reflect-metadata";
import { Container } from "inversify";

import { registerUserErrorModule } from "./modules/user-error/userError.module";

const container = new Container();

registerUserErrorModule(container);

export { container };
