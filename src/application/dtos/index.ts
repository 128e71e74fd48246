export {
  OrderBurgerInputDto,
  BurgerOutputDto,
  KitchenLogEntryOutputDto,
  StoreMenuOutputDto,
} from './burger-order.dto';
